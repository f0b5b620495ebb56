import type { Player } from "../types.ts";
import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Seed } from "../shared/prng.ts";
import { isTerminal } from "../game/gameOver.ts";

export type StrategyName = "random" | "greedy";

export interface MoveStrategy {
  readonly name: StrategyName;
  /** Colour the strategy plays; null means whichever side is to move. */
  readonly color: Player | null;
  pickMove(state: GameState): Move | null;
}

export type StrategyOptions = {
  color?: Player;
  seed?: Seed;
};

export function strategyColor(strategy: MoveStrategy, state: GameState): Player {
  return strategy.color ?? state.toMove;
}

/** Null when the game is over or the strategy's side has no legal move. */
export function selectMove(strategy: MoveStrategy, state: GameState): Move | null {
  if (isTerminal(state.status)) return null;
  return strategy.pickMove(state);
}
