import type { Rank } from "../types.ts";
import type { GameState } from "./state.ts";
import type { MoveRecord, MoveSpecial, PromotionRank } from "./moveTypes.ts";
import type { IllegalReason } from "./legality.ts";
import { nameToSquare } from "./coords.ts";
import { checkMoveAt } from "./legality.ts";
import { applyMoveChess } from "./applyMoveChess.ts";
import { isTerminal, resolveStatusAfterMove } from "./gameOver.ts";
import { opponentOf } from "../types.ts";

export type MoveMessage = "Move Successful" | "Illegal Move" | "Game Over" | `Invalid square coordinates: ${string}`;

export type MoveResult =
  | {
      ok: true;
      message: "Move Successful";
      move: MoveRecord;
      special: MoveSpecial;
      captured: Rank | null;
      promoted: PromotionRank | null;
    }
  | { ok: false; message: MoveMessage; reason?: IllegalReason };

/**
 * Validates and, when legal, executes `from`→`to` on `state` in place.
 * A rejected move leaves `state` exactly as it was.
 */
export function attemptMove(state: GameState, from: string, to: string, promotion?: string | null): MoveResult {
  if (isTerminal(state.status)) return { ok: false, message: "Game Over" };

  const f = nameToSquare(from);
  if (!f.ok) return { ok: false, message: `Invalid square coordinates: ${f.error}`, reason: "invalid_square" };
  const t = nameToSquare(to);
  if (!t.ok) return { ok: false, message: `Invalid square coordinates: ${t.error}`, reason: "invalid_square" };

  const verdict = checkMoveAt(state, f.square, t.square);
  if (!verdict.legal) return { ok: false, message: "Illegal Move", reason: verdict.reason };

  const mover = state.toMove;
  const applied = applyMoveChess(state, verdict.from, verdict.to, verdict.special, promotion);

  if (!applied.kingCaptured) {
    state.toMove = opponentOf(mover);
    state.status = resolveStatusAfterMove(state, mover);
  }

  return {
    ok: true,
    message: "Move Successful",
    move: applied.record,
    special: applied.special,
    captured: applied.captured ? applied.captured.rank : null,
    promoted: applied.promotedTo,
  };
}
