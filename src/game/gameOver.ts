import type { Player } from "../types.ts";
import type { GameState, GameStatus } from "./state.ts";
import { isKingInCheck } from "./attacks.ts";
import { generateLegalMoves } from "./legality.ts";

const STATUS_LABELS: Record<GameStatus, string> = {
  in_progress: "In Progress",
  white_wins: "White Wins!",
  black_wins: "Black Wins!",
  draw_stalemate: "Draw - Stalemate",
};

export function statusLabel(status: GameStatus): string {
  return STATUS_LABELS[status];
}

export function winFor(player: Player): GameStatus {
  return player === "W" ? "white_wins" : "black_wins";
}

export function isTerminal(status: GameStatus): boolean {
  return status !== "in_progress";
}

/**
 * Status once `state.toMove` has been handed to the side that must now reply.
 * No legal reply while in check is mate for `mover`; without check it is stalemate.
 */
export function resolveStatusAfterMove(state: GameState, mover: Player): GameStatus {
  if (generateLegalMoves(state).length > 0) return "in_progress";
  return isKingInCheck(state.board, state.toMove) ? winFor(mover) : "draw_stalemate";
}

export function status(state: GameState): GameStatus {
  return state.status;
}

export function isInCheck(state: GameState, player: Player = state.toMove): boolean {
  return isKingInCheck(state.board, player);
}
