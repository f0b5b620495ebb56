import type { Piece, Rank } from "../types.ts";
import type { SquareName } from "./coords.ts";

export interface Move {
  from: SquareName;
  to: SquareName;
}

/** How a rule-legal move departs from plain relocation. */
export type MoveSpecial = "normal" | "castle" | "en_passant";

export type PromotionRank = Extract<Rank, "Q" | "R" | "B" | "N">;

/** One executed move, kept for display (not replay). */
export interface MoveRecord {
  from: SquareName;
  to: SquareName;
  piece: Piece;
}
