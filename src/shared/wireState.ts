import type { Player, Rank } from "../types.ts";
import type { CastlingRights, GameState, GameStatus } from "../game/state.ts";
import type { HistoryRow } from "../game/history.ts";
import { pieceSymbol } from "../game/board.ts";
import { gameStateToFen } from "../game/fen.ts";
import { isInCheck, statusLabel } from "../game/gameOver.ts";
import { historyRows } from "../game/history.ts";

export type GameMode = "pvp" | "bot";

export type WireSnapshot = {
  fen: string;
  /** Eight rows from rank 8 down; each cell a FEN letter or "." when empty. */
  board: string[];
  toMove: Player;
  status: GameStatus;
  statusLabel: string;
  /** Whether the side to move is in check. */
  inCheck: boolean;
  castling: CastlingRights;
  enPassant: string | null;
  captured: Record<Player, Rank[]>;
  historyRows: HistoryRow[];
  mode: GameMode;
  botColor: Player | null;
  version: number;
};

export type SessionInfo = {
  mode: GameMode;
  botColor: Player | null;
  version: number;
};

export function boardRows(state: GameState): string[] {
  return state.board.map((row) => row.map((p) => (p ? pieceSymbol(p) : ".")).join(""));
}

export function serializeSnapshot(state: GameState, session: SessionInfo): WireSnapshot {
  return {
    fen: gameStateToFen(state),
    board: boardRows(state),
    toMove: state.toMove,
    status: state.status,
    statusLabel: statusLabel(state.status),
    inCheck: isInCheck(state),
    castling: {
      W: { ...state.castling.W },
      B: { ...state.castling.B },
    },
    enPassant: state.enPassantTarget,
    captured: { W: [...state.captured.W], B: [...state.captured.B] },
    historyRows: historyRows(state.history),
    mode: session.mode,
    botColor: session.botColor,
    version: session.version,
  };
}
