import { describe, it, expect } from "vitest";
import { cloneGameState, createInitialGameState, tryCreateGameState } from "./state.ts";

describe("state", () => {
  it("starts in progress with White to move and empty ledgers", () => {
    const s = createInitialGameState();
    expect(s.toMove).toBe("W");
    expect(s.status).toBe("in_progress");
    expect(s.history).toEqual([]);
    expect(s.captured).toEqual({ W: [], B: [] });
    expect(s.enPassantTarget).toBeNull();
  });

  it("throws on a bad placement only through the throwing constructor", () => {
    expect(tryCreateGameState("8/8")).toEqual({
      ok: false,
      error: "Invalid FEN placement '8/8': expected 8 ranks, got 2",
    });
    expect(() => createInitialGameState("8/8")).toThrow("expected 8 ranks, got 2");
  });

  it("clones with no shared mutable structure", () => {
    const s = createInitialGameState();
    const copy = cloneGameState(s);

    copy.board[6]?.splice(4, 1, null);
    const knight = copy.board[7]?.[1];
    if (knight) knight.square = { r: 5, c: 2 };
    copy.captured.B.push("Q");
    copy.castling.B.queenSide = false;
    copy.history.push({ from: "a2", to: "a3", piece: { owner: "W", rank: "P", square: { r: 5, c: 0 } } });

    expect(s.board[6]?.[4]?.rank).toBe("P");
    expect(s.board[7]?.[1]?.square).toEqual({ r: 7, c: 1 });
    expect(s.captured.B).toEqual([]);
    expect(s.castling.B.queenSide).toBe(true);
    expect(s.history).toEqual([]);
  });
});
