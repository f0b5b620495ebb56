import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { MoveStrategy, StrategyOptions } from "./strategy.ts";
import { generateLegalMoves } from "../game/legality.ts";
import { createPrng } from "../shared/prng.ts";
import { strategyColor } from "./strategy.ts";

export function createRandomStrategy(opts: StrategyOptions = {}): MoveStrategy {
  const rng = createPrng(opts.seed);
  const strategy: MoveStrategy = {
    name: "random",
    color: opts.color ?? null,
    pickMove: (state: GameState): Move | null => rng.pick(generateLegalMoves(state, strategyColor(strategy, state))),
  };
  return strategy;
}
