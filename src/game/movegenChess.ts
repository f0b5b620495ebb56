import type { Piece, Player, Square } from "../types.ts";
import type { Board } from "./board.ts";
import { isEmpty, isEnemyAt, isOwnAt, pieceAt } from "./board.ts";
import { inBounds } from "./coords.ts";

export type Dir = { dr: number; dc: number };

export const ORTHOGONAL: readonly Dir[] = [
  { dr: -1, dc: 0 },
  { dr: 1, dc: 0 },
  { dr: 0, dc: -1 },
  { dr: 0, dc: 1 },
];

export const DIAGONAL: readonly Dir[] = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: 1 },
  { dr: 1, dc: -1 },
  { dr: 1, dc: 1 },
];

export const ALL_DIRECTIONS: readonly Dir[] = [...ORTHOGONAL, ...DIAGONAL];

export const KNIGHT_JUMPS: readonly Dir[] = [
  { dr: -2, dc: -1 },
  { dr: -2, dc: 1 },
  { dr: 2, dc: -1 },
  { dr: 2, dc: 1 },
  { dr: -1, dc: -2 },
  { dr: -1, dc: 2 },
  { dr: 1, dc: -2 },
  { dr: 1, dc: 2 },
];

export function pawnDir(player: Player): number {
  // White starts on row 6 and moves toward row 0.
  return player === "W" ? -1 : 1;
}

export function pawnStartRow(player: Player): number {
  return player === "W" ? 6 : 1;
}

export function pawnPromotionRow(player: Player): number {
  return player === "W" ? 0 : 7;
}

function pawnMoves(board: Board, from: Square, player: Player): Square[] {
  const out: Square[] = [];
  const dr = pawnDir(player);

  const r1 = from.r + dr;
  if (inBounds(r1, from.c) && isEmpty(board, { r: r1, c: from.c })) {
    out.push({ r: r1, c: from.c });

    const r2 = from.r + 2 * dr;
    if (from.r === pawnStartRow(player) && inBounds(r2, from.c) && isEmpty(board, { r: r2, c: from.c })) {
      out.push({ r: r2, c: from.c });
    }
  }

  for (const dc of [-1, 1]) {
    const to = { r: from.r + dr, c: from.c + dc };
    if (inBounds(to.r, to.c) && isEnemyAt(board, to, player)) out.push(to);
  }

  return out;
}

function stepMoves(board: Board, from: Square, player: Player, steps: readonly Dir[]): Square[] {
  const out: Square[] = [];
  for (const { dr, dc } of steps) {
    const to = { r: from.r + dr, c: from.c + dc };
    if (!inBounds(to.r, to.c)) continue;
    if (isOwnAt(board, to, player)) continue;
    out.push(to);
  }
  return out;
}

function slidingMoves(board: Board, from: Square, player: Player, dirs: readonly Dir[]): Square[] {
  const out: Square[] = [];
  for (const { dr, dc } of dirs) {
    let r = from.r + dr;
    let c = from.c + dc;
    while (inBounds(r, c)) {
      const to = { r, c };
      if (isEmpty(board, to)) {
        out.push(to);
      } else {
        if (isEnemyAt(board, to, player)) out.push(to);
        break;
      }
      r += dr;
      c += dc;
    }
  }
  return out;
}

/**
 * Destinations matching the piece's movement pattern. Check-safety, castling
 * and en passant are left to the legality layer.
 */
export function pseudoLegalDestinations(board: Board, piece: Piece, from: Square = piece.square): Square[] {
  switch (piece.rank) {
    case "P":
      return pawnMoves(board, from, piece.owner);
    case "N":
      return stepMoves(board, from, piece.owner, KNIGHT_JUMPS);
    case "B":
      return slidingMoves(board, from, piece.owner, DIAGONAL);
    case "R":
      return slidingMoves(board, from, piece.owner, ORTHOGONAL);
    case "Q":
      return slidingMoves(board, from, piece.owner, ALL_DIRECTIONS);
    case "K":
      return stepMoves(board, from, piece.owner, ALL_DIRECTIONS);
    default: {
      const unreachable: never = piece.rank;
      throw new Error(`Unknown piece rank: ${String(unreachable)}`);
    }
  }
}

export function pseudoLegalDestinationsAt(board: Board, from: Square): Square[] {
  const piece = pieceAt(board, from);
  if (!piece) return [];
  return pseudoLegalDestinations(board, piece, from);
}
