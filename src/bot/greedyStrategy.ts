import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { MoveStrategy, StrategyOptions } from "./strategy.ts";
import { cloneGameState } from "../game/state.ts";
import { generateLegalMoves } from "../game/legality.ts";
import { attemptMove } from "../game/makeMove.ts";
import { createPrng } from "../shared/prng.ts";
import { evaluatePosition } from "./evaluate.ts";
import { strategyColor } from "./strategy.ts";

export type ScoredMove = { move: Move; score: number };

/** Each legal move played on its own copy of `state` and scored for the mover. */
export function scoreMoves(state: GameState, moves: readonly Move[]): ScoredMove[] {
  const mover = state.toMove;
  const out: ScoredMove[] = [];
  for (const move of moves) {
    const copy = cloneGameState(state);
    const res = attemptMove(copy, move.from, move.to);
    if (!res.ok) continue;
    out.push({ move, score: evaluatePosition(copy, mover) });
  }
  return out;
}

/**
 * Single-ply material plus mobility. Ties keep the earliest move in legal-move
 * order; the seeded fallback only runs when no candidate could be played.
 */
export function createGreedyStrategy(opts: StrategyOptions = {}): MoveStrategy {
  const rng = createPrng(opts.seed);
  const strategy: MoveStrategy = {
    name: "greedy",
    color: opts.color ?? null,
    pickMove: (state: GameState): Move | null => {
      const moves = generateLegalMoves(state, strategyColor(strategy, state));
      if (moves.length === 0) return null;

      let best: ScoredMove | null = null;
      for (const scored of scoreMoves(state, moves)) {
        if (best === null || scored.score > best.score) best = scored;
      }
      return best ? best.move : rng.pick(moves);
    },
  };
  return strategy;
}
