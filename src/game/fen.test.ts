import { describe, expect, test } from "vitest";
import { STARTING_FEN, parseFen, parsePlacement } from "./fen.ts";
import { createInitialGameState, tryCreateGameState } from "./state.ts";
import { gameStateToFen } from "./fen.ts";
import { attemptMove } from "./makeMove.ts";

describe("fen", () => {
  test("starting position FEN", () => {
    expect(gameStateToFen(createInitialGameState())).toBe(STARTING_FEN);
  });

  test("a bare placement gets White to move, full rights, no en passant", () => {
    const parsed = parseFen("4k3/8/8/8/8/8/8/4K3");
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.position.toMove).toBe("W");
    expect(parsed.position.castling).toEqual({
      W: { kingSide: true, queenSide: true },
      B: { kingSide: true, queenSide: true },
    });
    expect(parsed.position.enPassantTarget).toBeNull();
  });

  test("honours side, castling and en passant fields when present", () => {
    const parsed = parseFen("rnbqkbnr/ppp1pppp/8/3pP3/8/8/PPPP1PPP/RNBQKBNR w Kq d6 0 3");
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.position.toMove).toBe("W");
    expect(parsed.position.castling).toEqual({
      W: { kingSide: true, queenSide: false },
      B: { kingSide: false, queenSide: true },
    });
    expect(parsed.position.enPassantTarget).toBe("d6");
  });

  test("rejects malformed placements", () => {
    expect(parsePlacement("8/8/8/8/8/8/8")).toEqual({
      ok: false,
      error: "Invalid FEN placement '8/8/8/8/8/8/8': expected 8 ranks, got 7",
    });
    expect(parsePlacement("7/8/8/8/8/8/8/8")).toEqual({
      ok: false,
      error: "Invalid FEN placement '7/8/8/8/8/8/8/8': rank 8 covers 7 files",
    });
    expect(parsePlacement("8/8/8/8/8/8/8/8p")).toEqual({
      ok: false,
      error: "Invalid FEN placement '8/8/8/8/8/8/8/8p': rank 1 covers more than 8 files",
    });
    expect(parsePlacement("8/8/8/8/8/8/8/7x")).toEqual({
      ok: false,
      error: "Invalid FEN placement '8/8/8/8/8/8/8/7x': unknown piece 'x'",
    });
    expect(parsePlacement("kk6/8/8/8/8/8/8/8").ok).toBe(false);
  });

  test("rejects bad trailing fields", () => {
    expect(parseFen("8/8/8/8/8/8/8/8 x")).toEqual({ ok: false, error: "Invalid FEN side to move 'x'" });
    expect(parseFen("8/8/8/8/8/8/8/8 w KX")).toEqual({ ok: false, error: "Invalid FEN castling field 'KX'" });
    expect(parseFen("8/8/8/8/8/8/8/8 w - e4")).toEqual({ ok: false, error: "Invalid FEN en passant square 'e4'" });
  });

  test("new games surface placement errors as results", () => {
    const res = tryCreateGameState("not-a-fen");
    expect(res.ok).toBe(false);
  });

  test("exports the en passant square and move number after play", () => {
    const s = createInitialGameState();
    expect(attemptMove(s, "e2", "e4").ok).toBe(true);
    expect(gameStateToFen(s)).toBe("rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1");
    expect(attemptMove(s, "c7", "c5").ok).toBe(true);
    expect(gameStateToFen(s)).toBe("rnbqkbnr/pp1ppppp/8/2p5/4P3/8/PPPP1PPP/RNBQKBNR w KQkq c6 0 2");
  });

  test("placement round-trips through a new game", () => {
    const placement = "r3k2r/pp3ppp/2n5/3q4/8/2N5/PP3PPP/R3K2R";
    const s = createInitialGameState(placement);
    expect(gameStateToFen(s)).toBe(`${placement} w KQkq - 0 1`);
  });
});
