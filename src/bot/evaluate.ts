import type { Player, Rank } from "../types.ts";
import type { GameState } from "../game/state.ts";
import { piecesOf } from "../game/board.ts";
import { generateLegalMoves } from "../game/legality.ts";
import { opponentOf } from "../types.ts";

export const PIECE_VALUES: Record<Rank, number> = {
  P: 1,
  N: 3,
  B: 3,
  R: 5,
  Q: 9,
  K: 0,
};

export function material(state: GameState, player: Player): number {
  return piecesOf(state.board, player).reduce((sum, p) => sum + PIECE_VALUES[p.rank], 0);
}

/** Legal moves `player` has in this position; zero for the side not on move. */
export function mobility(state: GameState, player: Player): number {
  return generateLegalMoves(state, player).length;
}

export function evaluatePosition(state: GameState, perspective: Player): number {
  const opp = opponentOf(perspective);
  const materialDiff = material(state, perspective) - material(state, opp);
  const mobilityDiff = mobility(state, perspective) - mobility(state, opp);
  return materialDiff + mobilityDiff;
}
