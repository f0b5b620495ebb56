import type { Piece, Player, Rank, Square } from "../types.ts";
import { BOARD_SIZE, inBounds } from "./coords.ts";

/** 8×8 grid indexed `[r][c]`, row 0 = rank 8. */
export type Board = Array<Array<Piece | null>>;

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, () => null));
}

export function pieceAt(board: Board, sq: Square): Piece | null {
  if (!inBounds(sq.r, sq.c)) return null;
  return board[sq.r]?.[sq.c] ?? null;
}

export function isEmpty(board: Board, sq: Square): boolean {
  return pieceAt(board, sq) === null;
}

export function isEnemyAt(board: Board, sq: Square, player: Player): boolean {
  const p = pieceAt(board, sq);
  return Boolean(p && p.owner !== player);
}

export function isOwnAt(board: Board, sq: Square, player: Player): boolean {
  const p = pieceAt(board, sq);
  return Boolean(p && p.owner === player);
}

export function setPiece(board: Board, sq: Square, piece: Piece | null): void {
  const row = board[sq.r];
  if (!row || !inBounds(sq.r, sq.c)) throw new Error(`setPiece: square out of range r=${sq.r} c=${sq.c}`);
  row[sq.c] = piece;
}

export function clonePiece(p: Piece): Piece {
  return { owner: p.owner, rank: p.rank, square: { r: p.square.r, c: p.square.c } };
}

// Deep: every piece value is copied so no two boards alias a cell's contents.
export function cloneBoard(board: Board): Board {
  return board.map((row) => row.map((p) => (p ? clonePiece(p) : null)));
}

export function findKingSquare(board: Board, player: Player): Square | null {
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const p = board[r]?.[c];
      if (p && p.owner === player && p.rank === "K") return { r, c };
    }
  }
  return null;
}

export function piecesOf(board: Board, player: Player): Piece[] {
  const out: Piece[] = [];
  for (const row of board) {
    for (const p of row) {
      if (p && p.owner === player) out.push(p);
    }
  }
  return out;
}

export function countPieces(board: Board, player: Player, rank: Rank): number {
  return piecesOf(board, player).filter((p) => p.rank === rank).length;
}

/** FEN letter: uppercase for White. */
export function pieceSymbol(p: Pick<Piece, "owner" | "rank">): string {
  return p.owner === "W" ? p.rank : p.rank.toLowerCase();
}
