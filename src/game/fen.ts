import type { Piece, Player, Rank } from "../types.ts";
import type { Board } from "./board.ts";
import type { SquareName } from "./coords.ts";
import type { CastlingRights, GameState } from "./state.ts";
import { createEmptyBoard, pieceSymbol } from "./board.ts";
import { BOARD_SIZE, nameToSquare } from "./coords.ts";

export const STARTING_PLACEMENT = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR";
export const STARTING_FEN = `${STARTING_PLACEMENT} w KQkq - 0 1`;

export interface FenPosition {
  board: Board;
  toMove: Player;
  castling: CastlingRights;
  enPassantTarget: SquareName | null;
}

export type FenParseResult = { ok: true; position: FenPosition } | { ok: false; error: string };

const RANK_LETTERS: Record<string, Rank> = {
  p: "P",
  n: "N",
  b: "B",
  r: "R",
  q: "Q",
  k: "K",
};

function fail(error: string): { ok: false; error: string } {
  return { ok: false, error };
}

export function parsePlacement(placement: string): { ok: true; board: Board } | { ok: false; error: string } {
  const rows = placement.split("/");
  if (rows.length !== BOARD_SIZE) {
    return fail(`Invalid FEN placement '${placement}': expected 8 ranks, got ${rows.length}`);
  }

  const board = createEmptyBoard();
  const kings: Record<Player, number> = { W: 0, B: 0 };

  for (let r = 0; r < BOARD_SIZE; r++) {
    const rowStr = rows[r] ?? "";
    let c = 0;
    for (const ch of rowStr) {
      if (/^[1-8]$/.test(ch)) {
        c += Number(ch);
        continue;
      }
      const rank = RANK_LETTERS[ch.toLowerCase()];
      if (!rank) return fail(`Invalid FEN placement '${placement}': unknown piece '${ch}'`);
      if (c >= BOARD_SIZE) {
        return fail(`Invalid FEN placement '${placement}': rank ${BOARD_SIZE - r} covers more than 8 files`);
      }
      const owner: Player = ch === ch.toUpperCase() ? "W" : "B";
      if (rank === "K") kings[owner] += 1;
      const piece: Piece = { owner, rank, square: { r, c } };
      const row = board[r];
      if (row) row[c] = piece;
      c += 1;
    }
    if (c !== BOARD_SIZE) {
      return fail(`Invalid FEN placement '${placement}': rank ${BOARD_SIZE - r} covers ${c} files`);
    }
  }

  if (kings.W > 1 || kings.B > 1) {
    return fail(`Invalid FEN placement '${placement}': more than one king of a colour`);
  }

  return { ok: true, board };
}

function parseCastling(field: string): CastlingRights | null {
  const rights: CastlingRights = {
    W: { kingSide: false, queenSide: false },
    B: { kingSide: false, queenSide: false },
  };
  if (field === "-") return rights;
  if (!/^[KQkq]{1,4}$/.test(field)) return null;
  if (field.includes("K")) rights.W.kingSide = true;
  if (field.includes("Q")) rights.W.queenSide = true;
  if (field.includes("k")) rights.B.kingSide = true;
  if (field.includes("q")) rights.B.queenSide = true;
  return rights;
}

/**
 * Accepts either a bare placement field or a fuller FEN. Missing fields fall
 * back to White to move, all castling rights, no en passant target. Move
 * counters are ignored.
 */
export function parseFen(fen: string): FenParseResult {
  const fields = fen.trim().split(/\s+/);
  const placement = parsePlacement(fields[0] ?? "");
  if (!placement.ok) return placement;

  let toMove: Player = "W";
  const side = fields[1];
  if (side !== undefined) {
    if (side !== "w" && side !== "b") return fail(`Invalid FEN side to move '${side}'`);
    toMove = side === "w" ? "W" : "B";
  }

  let castling: CastlingRights = {
    W: { kingSide: true, queenSide: true },
    B: { kingSide: true, queenSide: true },
  };
  const castlingField = fields[2];
  if (castlingField !== undefined) {
    const parsed = parseCastling(castlingField);
    if (!parsed) return fail(`Invalid FEN castling field '${castlingField}'`);
    castling = parsed;
  }

  let enPassantTarget: SquareName | null = null;
  const epField = fields[3];
  if (epField !== undefined && epField !== "-") {
    const sq = nameToSquare(epField);
    if (!sq.ok || (sq.square.r !== 2 && sq.square.r !== 5)) {
      return fail(`Invalid FEN en passant square '${epField}'`);
    }
    enPassantTarget = sq.name;
  }

  return { ok: true, position: { board: placement.board, toMove, castling, enPassantTarget } };
}

export function boardToPlacement(board: Board): string {
  const rows: string[] = [];
  for (const rowCells of board) {
    let empties = 0;
    let row = "";
    for (const p of rowCells) {
      if (!p) {
        empties++;
        continue;
      }
      if (empties > 0) {
        row += String(empties);
        empties = 0;
      }
      row += pieceSymbol(p);
    }
    if (empties > 0) row += String(empties);
    rows.push(row);
  }
  return rows.join("/");
}

export function gameStateToFen(state: GameState): string {
  const side = state.toMove === "W" ? "w" : "b";

  const c = state.castling;
  let castling = "";
  if (c.W.kingSide) castling += "K";
  if (c.W.queenSide) castling += "Q";
  if (c.B.kingSide) castling += "k";
  if (c.B.queenSide) castling += "q";
  if (!castling) castling = "-";

  const ep = state.enPassantTarget ?? "-";
  const fullmove = 1 + Math.floor(state.history.length / 2);

  return `${boardToPlacement(state.board)} ${side} ${castling} ${ep} 0 ${fullmove}`;
}
