// "Core" is the stable, deterministic rules surface (no I/O, no rendering).

export type { Player, Rank, Square, Piece } from "../types.ts";
export type { SquareName, SquareParseResult } from "../game/coords.ts";
export type { Board } from "../game/board.ts";
export type { GameState, GameStatus, CastlingRights, CastlingSide, NewGameResult } from "../game/state.ts";
export type { Move, MoveRecord, MoveSpecial, PromotionRank } from "../game/moveTypes.ts";
export type { IllegalReason, MoveVerdict } from "../game/legality.ts";
export type { MoveResult, MoveMessage } from "../game/makeMove.ts";
export type { HistoryRow } from "../game/history.ts";
export type { MoveStrategy, StrategyName, StrategyOptions } from "../bot/strategy.ts";
export type { BotTier } from "../bot/presets.ts";

import type { GameState } from "../game/state.ts";
import { createInitialGameState } from "../game/state.ts";

export { nameToSquare, squareToName, rowColToSquare, isSquareName } from "../game/coords.ts";
export { pseudoLegalDestinations } from "../game/movegenChess.ts";
export { isSquareAttacked, isKingInCheck } from "../game/attacks.ts";
export { checkMove, isLegalMove, generateLegalMoves, legalDestinations } from "../game/legality.ts";
export { attemptMove } from "../game/makeMove.ts";
export { status, statusLabel, isInCheck, isTerminal } from "../game/gameOver.ts";
export { cloneGameState, tryCreateGameState } from "../game/state.ts";
export { STARTING_FEN, STARTING_PLACEMENT, parseFen, gameStateToFen } from "../game/fen.ts";
export { formatMoveRecord, historyRows } from "../game/history.ts";
export { selectMove } from "../bot/strategy.ts";
export { createRandomStrategy } from "../bot/randomStrategy.ts";
export { createGreedyStrategy } from "../bot/greedyStrategy.ts";
export { BOT_PRESETS, createStrategyForTier, isBotTier } from "../bot/presets.ts";

/** Standard position, or the given FEN. Throws on malformed input; see `tryCreateGameState`. */
export function newGame(placement?: string): GameState {
  return createInitialGameState(placement);
}
