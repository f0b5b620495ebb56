import type { Player, Rank, Square } from "../types.ts";
import type { Board } from "./board.ts";
import { findKingSquare, pieceAt } from "./board.ts";
import { inBounds } from "./coords.ts";
import { ALL_DIRECTIONS, KNIGHT_JUMPS, pawnDir } from "./movegenChess.ts";
import { opponentOf } from "../types.ts";

function hasPieceAt(board: Board, r: number, c: number, owner: Player, ranks: readonly Rank[]): boolean {
  if (!inBounds(r, c)) return false;
  const p = pieceAt(board, { r, c });
  return Boolean(p && p.owner === owner && ranks.includes(p.rank));
}

export function isSquareAttacked(board: Board, square: Square, byPlayer: Player): boolean {
  const { r, c } = square;

  for (const { dr, dc } of KNIGHT_JUMPS) {
    if (hasPieceAt(board, r + dr, c + dc, byPlayer, ["N"])) return true;
  }

  // An attacking pawn sits one step behind the target, from its own point of view.
  const back = -pawnDir(byPlayer);
  for (const dc of [-1, 1]) {
    if (hasPieceAt(board, r + back, c + dc, byPlayer, ["P"])) return true;
  }

  for (const { dr, dc } of ALL_DIRECTIONS) {
    if (hasPieceAt(board, r + dr, c + dc, byPlayer, ["K"])) return true;
  }

  for (const { dr, dc } of ALL_DIRECTIONS) {
    const sliders: readonly Rank[] = dr === 0 || dc === 0 ? ["R", "Q"] : ["B", "Q"];
    let rr = r + dr;
    let cc = c + dc;
    while (inBounds(rr, cc)) {
      const p = pieceAt(board, { r: rr, c: cc });
      if (p) {
        if (p.owner === byPlayer && sliders.includes(p.rank)) return true;
        break;
      }
      rr += dr;
      cc += dc;
    }
  }

  return false;
}

/** A board without the player's king counts as check. */
export function isKingInCheck(board: Board, player: Player): boolean {
  const kingSq = findKingSquare(board, player);
  if (!kingSq) return true;
  return isSquareAttacked(board, kingSq, opponentOf(player));
}
