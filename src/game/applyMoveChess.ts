import type { Piece, Player, Square } from "../types.ts";
import type { GameState } from "./state.ts";
import type { MoveRecord, MoveSpecial, PromotionRank } from "./moveTypes.ts";
import { clonePiece, pieceAt, setPiece } from "./board.ts";
import { squareToName } from "./coords.ts";
import { pawnPromotionRow } from "./movegenChess.ts";
import { castlingSideFor, enPassantVictimSquare, rookCastleTarget, rookHome } from "./legality.ts";
import { opponentOf } from "../types.ts";

export interface AppliedMove {
  record: MoveRecord;
  special: MoveSpecial;
  captured: Piece | null;
  promotedTo: PromotionRank | null;
  kingCaptured: boolean;
}

const PROMOTION_RANKS: readonly PromotionRank[] = ["Q", "R", "B", "N"];

/** Case-insensitive Q/R/B/N; anything else (or nothing) promotes to a queen. */
export function normalizePromotion(choice: string | null | undefined): PromotionRank {
  const upper = typeof choice === "string" ? choice.trim().toUpperCase().slice(0, 1) : "";
  const found = PROMOTION_RANKS.find((r) => r === upper);
  return found ?? "Q";
}

function sideToClear(player: Player, sq: Square): "kingSide" | "queenSide" | null {
  if (sq.r !== rookHome(player, "kingSide").r) return null;
  if (sq.c === rookHome(player, "kingSide").c) return "kingSide";
  if (sq.c === rookHome(player, "queenSide").c) return "queenSide";
  return null;
}

function updateCastlingRights(state: GameState, moved: Piece, from: Square, captured: Piece | null, capturedAt: Square | null): void {
  const mover = moved.owner;

  if (moved.rank === "K") {
    state.castling[mover].kingSide = false;
    state.castling[mover].queenSide = false;
  }

  if (moved.rank === "R") {
    const side = sideToClear(mover, from);
    if (side) state.castling[mover][side] = false;
  }

  if (captured && captured.rank === "R" && capturedAt) {
    const opp = opponentOf(mover);
    const side = sideToClear(opp, capturedAt);
    if (side) state.castling[opp][side] = false;
  }
}

/**
 * Executes an already validated move on `state` in place. Turn and status are
 * left to the caller.
 */
export function applyMoveChess(
  state: GameState,
  from: Square,
  to: Square,
  special: MoveSpecial,
  promotion?: string | null
): AppliedMove {
  const moving = pieceAt(state.board, from);
  if (!moving) throw new Error(`applyMoveChess: no piece at ${squareToName(from)}`);
  const mover = moving.owner;

  // Clear en passant by default; re-set it only on a fresh pawn double-step.
  state.enPassantTarget = null;

  let captured: Piece | null = null;
  let capturedAt: Square | null = null;

  if (special === "en_passant") {
    capturedAt = enPassantVictimSquare(from, to);
    captured = pieceAt(state.board, capturedAt);
    setPiece(state.board, capturedAt, null);
  } else {
    captured = pieceAt(state.board, to);
    capturedAt = captured ? to : null;
  }

  moving.square = { r: to.r, c: to.c };
  setPiece(state.board, to, moving);
  setPiece(state.board, from, null);

  if (moving.rank === "P" && Math.abs(to.r - from.r) === 2) {
    state.enPassantTarget = squareToName({ r: (from.r + to.r) / 2, c: to.c });
  }

  const record: MoveRecord = { from: squareToName(from), to: squareToName(to), piece: clonePiece(moving) };
  state.history.push(record);

  if (captured) {
    state.captured[mover].push(captured.rank);
    if (captured.rank === "K") {
      // Only reachable from a hand-built position.
      state.status = mover === "W" ? "white_wins" : "black_wins";
      return { record, special, captured, promotedTo: null, kingCaptured: true };
    }
  }

  if (special === "castle") {
    const side = castlingSideFor(from, to);
    if (side) {
      const rookFrom = rookHome(mover, side);
      const rookTo = rookCastleTarget(mover, side);
      const rook = pieceAt(state.board, rookFrom);
      if (rook) {
        rook.square = rookTo;
        setPiece(state.board, rookTo, rook);
        setPiece(state.board, rookFrom, null);
      }
    }
  }

  updateCastlingRights(state, moving, from, captured, capturedAt);

  let promotedTo: PromotionRank | null = null;
  if (moving.rank === "P" && to.r === pawnPromotionRow(mover)) {
    promotedTo = normalizePromotion(promotion);
    setPiece(state.board, to, { owner: mover, rank: promotedTo, square: { r: to.r, c: to.c } });
  }

  return { record, special, captured, promotedTo, kingCaptured: false };
}
