import { describe, it, expect } from "vitest";
import { checkMove, generateLegalMoves, isLegalMove, legalDestinations } from "./legality.ts";
import { createInitialGameState } from "./state.ts";
import { attemptMove } from "./makeMove.ts";
import type { GameState } from "./state.ts";

function play(state: GameState, ...moves: Array<[string, string]>): void {
  for (const [from, to] of moves) {
    const res = attemptMove(state, from, to);
    if (!res.ok) throw new Error(`${from}-${to}: ${res.message}`);
  }
}

describe("legality", () => {
  it("White has 20 moves from the start and Black has none", () => {
    const s = createInitialGameState();
    expect(generateLegalMoves(s, "W")).toHaveLength(20);
    expect(generateLegalMoves(s, "B")).toEqual([]);
  });

  it("Black has 20 replies after 1.e4", () => {
    const s = createInitialGameState();
    play(s, ["e2", "e4"]);
    expect(generateLegalMoves(s)).toHaveLength(20);
  });

  it("lists moves row-major by origin, then destination", () => {
    const s = createInitialGameState();
    const moves = generateLegalMoves(s);
    // a4 (row 4) sorts ahead of a3 (row 5).
    expect(moves[0]).toEqual({ from: "a2", to: "a4" });
    expect(moves[1]).toEqual({ from: "a2", to: "a3" });
    expect(moves.slice(-4)).toEqual([
      { from: "b1", to: "a3" },
      { from: "b1", to: "c3" },
      { from: "g1", to: "f3" },
      { from: "g1", to: "h3" },
    ]);
  });

  it("reports why a move is rejected", () => {
    const s = createInitialGameState();
    expect(checkMove(s, "e3", "e4")).toEqual({ legal: false, reason: "no_piece" });
    expect(checkMove(s, "e7", "e5")).toEqual({ legal: false, reason: "not_your_turn" });
    expect(checkMove(s, "a1", "a2")).toEqual({ legal: false, reason: "own_piece_on_target" });
    expect(checkMove(s, "e2", "e5")).toEqual({ legal: false, reason: "unreachable" });
    expect(checkMove(s, "e9", "e4")).toEqual({
      legal: false,
      reason: "invalid_square",
      detail: "Invalid square name 'e9': rank '9' is outside 1-8",
    });
  });

  it("rejects moving a pinned piece off its pin line", () => {
    // Black rook e8 pins the white knight e2 to the king on e1.
    const s = createInitialGameState("k3r3/8/8/8/8/8/4N3/4K3");
    expect(isLegalMove(s, "e2", "c3")).toBe(false);
    expect(checkMove(s, "e2", "c3")).toEqual({ legal: false, reason: "leaves_king_in_check" });
    expect(legalDestinations(s, "e2")).toEqual([]);
  });

  it("a pinned slider may still move along the pin", () => {
    const s = createInitialGameState("k3r3/8/8/8/8/8/4R3/4K3");
    expect(legalDestinations(s, "e2")).toEqual(["e8", "e7", "e6", "e5", "e4", "e3"]);
  });

  it("kings cannot step into check", () => {
    const s = createInitialGameState("k7/8/8/8/8/8/3r4/4K3");
    expect(legalDestinations(s, "e1")).toEqual(["d2", "f1"]);
  });

  it("only moves that answer a check are legal", () => {
    const s = createInitialGameState("k3r3/8/8/8/8/8/3B4/4K3");
    const moves = generateLegalMoves(s).map((m) => `${m.from}-${m.to}`);
    expect(moves).toEqual(["d2-e3", "e1-f2", "e1-d1", "e1-f1"]);
  });

  it("returns no destinations for bad or empty squares", () => {
    const s = createInitialGameState();
    expect(legalDestinations(s, "z9")).toEqual([]);
    expect(legalDestinations(s, "e4")).toEqual([]);
    expect(legalDestinations(s, "e7")).toEqual([]);
  });

  describe("castling", () => {
    const open = "r3k2r/8/8/8/8/8/8/R3K2R";

    it("is available on both wings when the path is clear and safe", () => {
      const s = createInitialGameState(open);
      expect(checkMove(s, "e1", "g1")).toMatchObject({ legal: true, special: "castle" });
      expect(checkMove(s, "e1", "c1")).toMatchObject({ legal: true, special: "castle" });
      expect(legalDestinations(s, "e1")).toEqual(["d2", "e2", "f2", "c1", "d1", "f1", "g1"]);
    });

    it("needs the matching right", () => {
      const s = createInitialGameState(`${open} w Qkq -`);
      expect(checkMove(s, "e1", "g1")).toEqual({ legal: false, reason: "unreachable" });
      expect(isLegalMove(s, "e1", "c1")).toBe(true);
    });

    it("needs an empty path between king and rook", () => {
      const s = createInitialGameState("r3k2r/8/8/8/8/8/8/RN2K1NR");
      expect(isLegalMove(s, "e1", "g1")).toBe(false);
      expect(isLegalMove(s, "e1", "c1")).toBe(false);
    });

    it("is refused out of, through or into check", () => {
      // Rook on f8 covers f1.
      const through = createInitialGameState("4kr2/8/8/8/8/8/8/R3K2R");
      expect(isLegalMove(through, "e1", "g1")).toBe(false);
      expect(isLegalMove(through, "e1", "c1")).toBe(true);

      // Rook on e8 gives check.
      const inCheck = createInitialGameState("4r2k/8/8/8/8/8/8/R3K2R");
      expect(isLegalMove(inCheck, "e1", "g1")).toBe(false);
      expect(isLegalMove(inCheck, "e1", "c1")).toBe(false);

      // Bishop on a7 covers g1.
      const into = createInitialGameState("b3k3/8/8/8/8/8/8/R3K2R");
      expect(isLegalMove(into, "e1", "g1")).toBe(true);
      const into2 = createInitialGameState("4k3/b7/8/8/8/8/8/R3K2R");
      expect(isLegalMove(into2, "e1", "g1")).toBe(false);
    });

    it("ignores an attacked b1 on the queen side", () => {
      const s = createInitialGameState("1r2k3/8/8/8/8/8/8/R3K3");
      expect(isLegalMove(s, "e1", "c1")).toBe(true);
    });

    it("needs the own rook on its corner", () => {
      const enemyOnCorner = createInitialGameState("4k3/8/8/8/8/8/8/4K2n w K -");
      expect(isLegalMove(enemyOnCorner, "e1", "g1")).toBe(false);
      const bishopOnCorner = createInitialGameState("4k3/8/8/8/8/8/8/4K2B w K -");
      expect(isLegalMove(bishopOnCorner, "e1", "g1")).toBe(false);
    });
  });

  describe("en passant", () => {
    it("is legal only on the move right after the double step", () => {
      const s = createInitialGameState();
      play(s, ["e2", "e4"], ["a7", "a6"], ["e4", "e5"], ["d7", "d5"]);
      expect(s.enPassantTarget).toBe("d6");
      expect(checkMove(s, "e5", "d6")).toMatchObject({ legal: true, special: "en_passant" });

      play(s, ["h2", "h3"], ["h7", "h6"]);
      expect(s.enPassantTarget).toBeNull();
      expect(checkMove(s, "e5", "d6")).toEqual({ legal: false, reason: "unreachable" });
    });

    it("is rejected when removing both pawns would expose the king", () => {
      // King a5, pawns b5 (White) and c5 (Black, just moved c7-c5), rook h5.
      const s = createInitialGameState("4k3/8/8/KPp4r/8/8/8/8 w - c6");
      expect(checkMove(s, "b5", "c6")).toEqual({ legal: false, reason: "leaves_king_in_check" });
      expect(isLegalMove(s, "b5", "b6")).toBe(true);
    });
  });
});
