import type { Player, Rank } from "../types.ts";
import type { Board } from "./board.ts";
import type { SquareName } from "./coords.ts";
import type { MoveRecord } from "./moveTypes.ts";
import { clonePiece, cloneBoard } from "./board.ts";
import { parseFen, STARTING_PLACEMENT } from "./fen.ts";

export type GameStatus = "in_progress" | "white_wins" | "black_wins" | "draw_stalemate";

export type CastlingSide = "kingSide" | "queenSide";

export type CastlingRights = Record<Player, Record<CastlingSide, boolean>>;

export interface GameState {
  board: Board;
  toMove: Player;
  history: MoveRecord[];
  status: GameStatus;
  castling: CastlingRights;
  /** Square a pawn just passed over; valid for the next move only. */
  enPassantTarget: SquareName | null;
  /** `captured.W` holds the ranks of Black pieces taken by White, in capture order. */
  captured: Record<Player, Rank[]>;
}

export type NewGameResult = { ok: true; state: GameState } | { ok: false; error: string };

/**
 * Builds a game from a FEN string. A bare placement field starts with White to
 * move, full castling rights and no en passant target; trailing FEN fields,
 * when present, override those defaults.
 */
export function tryCreateGameState(fen: string = STARTING_PLACEMENT): NewGameResult {
  const parsed = parseFen(fen);
  if (!parsed.ok) return parsed;
  const { board, toMove, castling, enPassantTarget } = parsed.position;
  return {
    ok: true,
    state: {
      board,
      toMove,
      history: [],
      status: "in_progress",
      castling,
      enPassantTarget,
      captured: { W: [], B: [] },
    },
  };
}

export function createInitialGameState(fen?: string): GameState {
  const res = tryCreateGameState(fen);
  if (!res.ok) throw new Error(res.error);
  return res.state;
}

export function cloneGameState(state: GameState): GameState {
  return {
    board: cloneBoard(state.board),
    toMove: state.toMove,
    history: state.history.map((m) => ({ from: m.from, to: m.to, piece: clonePiece(m.piece) })),
    status: state.status,
    castling: {
      W: { ...state.castling.W },
      B: { ...state.castling.B },
    },
    enPassantTarget: state.enPassantTarget,
    captured: { W: [...state.captured.W], B: [...state.captured.B] },
  };
}
