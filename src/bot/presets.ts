import type { MoveStrategy, StrategyName, StrategyOptions } from "./strategy.ts";
import { createGreedyStrategy } from "./greedyStrategy.ts";
import { createRandomStrategy } from "./randomStrategy.ts";

export type BotTier = "beginner" | "strong";

export type BotPreset = {
  strategy: StrategyName;
  label: string;
};

export const BOT_PRESETS: Record<BotTier, BotPreset> = {
  beginner: { strategy: "random", label: "Beginner (random moves)" },
  strong: { strategy: "greedy", label: "Strong (greedy, one ply)" },
} as const;

export const DEFAULT_BOT_TIER: BotTier = "strong";

export function isBotTier(v: unknown): v is BotTier {
  return v === "beginner" || v === "strong";
}

export function createStrategy(name: StrategyName, opts: StrategyOptions = {}): MoveStrategy {
  return name === "random" ? createRandomStrategy(opts) : createGreedyStrategy(opts);
}

export function createStrategyForTier(tier: BotTier, opts: StrategyOptions = {}): MoveStrategy {
  return createStrategy(BOT_PRESETS[tier].strategy, opts);
}
