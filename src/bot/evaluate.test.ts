import { describe, it, expect } from "vitest";
import { evaluatePosition, material, mobility } from "./evaluate.ts";
import { createInitialGameState } from "../game/state.ts";
import { attemptMove } from "../game/makeMove.ts";

describe("evaluate", () => {
  it("counts 39 points of material a side at the start", () => {
    const s = createInitialGameState();
    expect(material(s, "W")).toBe(39);
    expect(material(s, "B")).toBe(39);
  });

  it("counts mobility only for the side on move", () => {
    const s = createInitialGameState();
    expect(mobility(s, "W")).toBe(20);
    expect(mobility(s, "B")).toBe(0);
    expect(evaluatePosition(s, "W")).toBe(20);
    expect(evaluatePosition(s, "B")).toBe(-20);

    expect(attemptMove(s, "e2", "e4").ok).toBe(true);
    expect(mobility(s, "W")).toBe(0);
    expect(mobility(s, "B")).toBe(20);
  });

  it("scores from the given side's point of view", () => {
    // White: king + rook; Black: king alone in the corner, to move.
    const s = createInitialGameState("k7/8/8/8/8/8/8/R3K3 b - -");
    expect(material(s, "W")).toBe(5);
    expect(material(s, "B")).toBe(0);
    // Black king a8: b8 and b7 (a7 is covered by the rook on the a-file).
    expect(mobility(s, "B")).toBe(2);
    expect(mobility(s, "W")).toBe(0);
    expect(evaluatePosition(s, "B")).toBe(-3);
    expect(evaluatePosition(s, "W")).toBe(3);
  });
});
