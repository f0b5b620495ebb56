export type Player = "W" | "B";

/** Chess piece kinds, by their FEN letter. */
export type Rank = "P" | "N" | "B" | "R" | "Q" | "K";

export interface Square { r: number; c: number; }

export interface Piece { owner: Player; rank: Rank; square: Square; }

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

export function playerName(p: Player): "White" | "Black" {
  return p === "W" ? "White" : "Black";
}
