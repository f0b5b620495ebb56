import type { Piece, Player, Square } from "../types.ts";
import type { Board } from "./board.ts";
import type { GameState, CastlingSide } from "./state.ts";
import type { Move, MoveSpecial } from "./moveTypes.ts";
import { cloneBoard, isEmpty, pieceAt, setPiece } from "./board.ts";
import type { SquareName } from "./coords.ts";
import { ALL_SQUARES, inBounds, nameToSquare, sameSquare, squareIndex, squareToName } from "./coords.ts";
import { isKingInCheck, isSquareAttacked } from "./attacks.ts";
import { pawnDir, pseudoLegalDestinations } from "./movegenChess.ts";
import { opponentOf } from "../types.ts";

export type IllegalReason =
  | "invalid_square"
  | "no_piece"
  | "not_your_turn"
  | "own_piece_on_target"
  | "unreachable"
  | "leaves_king_in_check";

export type MoveVerdict =
  | { legal: true; special: MoveSpecial; from: Square; to: Square; piece: Piece }
  | { legal: false; reason: IllegalReason; detail?: string };

export function homeRow(player: Player): number {
  return player === "W" ? 7 : 0;
}

const KING_HOME_COL = 4;

export function castlingSideFor(from: Square, to: Square): CastlingSide | null {
  if (from.r !== to.r || Math.abs(to.c - from.c) !== 2) return null;
  return to.c > from.c ? "kingSide" : "queenSide";
}

export function rookHome(player: Player, side: CastlingSide): Square {
  return { r: homeRow(player), c: side === "kingSide" ? 7 : 0 };
}

/** Where the rook lands after castling on `side`. */
export function rookCastleTarget(player: Player, side: CastlingSide): Square {
  return { r: homeRow(player), c: side === "kingSide" ? 5 : 3 };
}

export function canCastle(state: GameState, player: Player, side: CastlingSide): boolean {
  if (!state.castling[player][side]) return false;

  const row = homeRow(player);
  const king = pieceAt(state.board, { r: row, c: KING_HOME_COL });
  if (!king || king.owner !== player || king.rank !== "K") return false;

  const rook = pieceAt(state.board, rookHome(player, side));
  if (!rook || rook.owner !== player || rook.rank !== "R") return false;

  const betweenCols = side === "kingSide" ? [5, 6] : [1, 2, 3];
  for (const c of betweenCols) {
    if (!isEmpty(state.board, { r: row, c })) return false;
  }

  // King may not start on, pass through or land on an attacked square.
  const opp = opponentOf(player);
  const kingPathCols = side === "kingSide" ? [4, 5, 6] : [4, 3, 2];
  for (const c of kingPathCols) {
    if (isSquareAttacked(state.board, { r: row, c }, opp)) return false;
  }

  return true;
}

/** Square of the pawn an en passant capture removes (beside the mover). */
export function enPassantVictimSquare(from: Square, to: Square): Square {
  return { r: from.r, c: to.c };
}

export function isEnPassantCapture(state: GameState, piece: Piece, from: Square, to: Square): boolean {
  if (piece.rank !== "P" || !state.enPassantTarget) return false;
  if (to.r !== from.r + pawnDir(piece.owner) || Math.abs(to.c - from.c) !== 1) return false;
  if (squareToName(to) !== state.enPassantTarget) return false;
  if (!isEmpty(state.board, to)) return false;
  const victim = pieceAt(state.board, enPassantVictimSquare(from, to));
  return Boolean(victim && victim.owner !== piece.owner && victim.rank === "P");
}

/**
 * Position after the move, on a fresh board. Promotion is ignored: the promoted
 * piece stands on the same square, which is all a check test needs.
 */
export function boardAfterMove(board: Board, from: Square, to: Square, special: MoveSpecial): Board {
  const next = cloneBoard(board);
  const moving = pieceAt(next, from);
  if (!moving) throw new Error(`boardAfterMove: no piece at r=${from.r} c=${from.c}`);

  if (special === "en_passant") setPiece(next, enPassantVictimSquare(from, to), null);

  setPiece(next, from, null);
  setPiece(next, to, { ...moving, square: { r: to.r, c: to.c } });

  if (special === "castle") {
    const side = castlingSideFor(from, to);
    if (side) {
      const rookFrom = rookHome(moving.owner, side);
      const rookTo = rookCastleTarget(moving.owner, side);
      const rook = pieceAt(next, rookFrom);
      setPiece(next, rookFrom, null);
      setPiece(next, rookTo, rook ? { ...rook, square: rookTo } : null);
    }
  }

  return next;
}

function ruleLegalSpecial(state: GameState, piece: Piece, from: Square, to: Square): MoveSpecial | null {
  const pseudo = pseudoLegalDestinations(state.board, piece, from);
  if (pseudo.some((sq) => sameSquare(sq, to))) return "normal";

  if (piece.rank === "K" && from.r === homeRow(piece.owner) && from.c === KING_HOME_COL) {
    const side = castlingSideFor(from, to);
    if (side && canCastle(state, piece.owner, side)) return "castle";
  }

  if (isEnPassantCapture(state, piece, from, to)) return "en_passant";

  return null;
}

export function checkMoveAt(state: GameState, from: Square, to: Square): MoveVerdict {
  const piece = pieceAt(state.board, from);
  if (!piece) return { legal: false, reason: "no_piece" };
  if (piece.owner !== state.toMove) return { legal: false, reason: "not_your_turn" };

  const target = pieceAt(state.board, to);
  if (target && target.owner === piece.owner) return { legal: false, reason: "own_piece_on_target" };

  const special = ruleLegalSpecial(state, piece, from, to);
  if (!special) return { legal: false, reason: "unreachable" };

  const after = boardAfterMove(state.board, from, to, special);
  if (isKingInCheck(after, piece.owner)) return { legal: false, reason: "leaves_king_in_check" };

  return { legal: true, special, from, to, piece };
}

export function checkMove(state: GameState, from: string, to: string): MoveVerdict {
  const f = nameToSquare(from);
  if (!f.ok) return { legal: false, reason: "invalid_square", detail: f.error };
  const t = nameToSquare(to);
  if (!t.ok) return { legal: false, reason: "invalid_square", detail: t.error };
  return checkMoveAt(state, f.square, t.square);
}

export function isLegalMove(state: GameState, from: string, to: string): boolean {
  return checkMove(state, from, to).legal;
}

function candidateDestinations(state: GameState, piece: Piece, from: Square): Square[] {
  const out = pseudoLegalDestinations(state.board, piece, from);
  if (piece.rank === "K") {
    out.push({ r: from.r, c: from.c + 2 }, { r: from.r, c: from.c - 2 });
  }
  if (piece.rank === "P") {
    const dr = pawnDir(piece.owner);
    out.push({ r: from.r + dr, c: from.c - 1 }, { r: from.r + dr, c: from.c + 1 });
  }
  return out;
}

/**
 * Every legal `(from, to)` pair for `player`, ordered row-major by origin and
 * then by destination. Empty when `player` is not the side to move.
 */
export function generateLegalMoves(state: GameState, player: Player = state.toMove): Move[] {
  if (player !== state.toMove) return [];

  const moves: Move[] = [];
  for (const from of ALL_SQUARES) {
    const piece = pieceAt(state.board, from);
    if (!piece || piece.owner !== player) continue;

    const seen = new Set<number>();
    const targets = candidateDestinations(state, piece, from)
      .filter((to) => inBounds(to.r, to.c))
      .filter((to) => {
        const idx = squareIndex(to);
        if (seen.has(idx)) return false;
        seen.add(idx);
        return true;
      })
      .sort((a, b) => squareIndex(a) - squareIndex(b));

    for (const to of targets) {
      if (checkMoveAt(state, from, to).legal) {
        moves.push({ from: squareToName(from), to: squareToName(to) });
      }
    }
  }
  return moves;
}

export function legalDestinations(state: GameState, square: string): SquareName[] {
  const parsed = nameToSquare(square);
  if (!parsed.ok) return [];
  return generateLegalMoves(state)
    .filter((m) => m.from === parsed.name)
    .map((m) => m.to);
}
