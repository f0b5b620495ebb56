import type { Square } from "../types.ts";

export const FILES = ["a", "b", "c", "d", "e", "f", "g", "h"] as const;
export const RANKS = ["1", "2", "3", "4", "5", "6", "7", "8"] as const;

export type FileLetter = (typeof FILES)[number];
export type RankDigit = (typeof RANKS)[number];
export type SquareName = `${FileLetter}${RankDigit}`;

export const BOARD_SIZE = 8;

export type SquareParseResult =
  | { ok: true; square: Square; name: SquareName }
  | { ok: false; error: string };

const FILE_SET: ReadonlySet<string> = new Set(FILES);
const RANK_SET: ReadonlySet<string> = new Set(RANKS);

function isFileLetter(ch: string): ch is FileLetter {
  return FILE_SET.has(ch);
}

function isRankDigit(ch: string): ch is RankDigit {
  return RANK_SET.has(ch);
}

export function inBounds(r: number, c: number): boolean {
  return r >= 0 && r < BOARD_SIZE && c >= 0 && c < BOARD_SIZE;
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.r === b.r && a.c === b.c;
}

/** Row 0 is rank 8; column 0 is file a. */
export function squareToName(sq: Square): SquareName {
  const file = FILES[sq.c];
  const rank = RANKS[BOARD_SIZE - 1 - sq.r];
  if (file === undefined || rank === undefined) {
    throw new Error(`Square out of range: r=${sq.r} c=${sq.c}`);
  }
  return `${file}${rank}`;
}

export function nameToSquare(name: string): SquareParseResult {
  if (typeof name !== "string" || name.length !== 2) {
    return { ok: false, error: `Invalid square name '${String(name)}': expected a file a-h and a rank 1-8` };
  }
  const file = name[0];
  const rank = name[1];
  if (!isFileLetter(file)) {
    return { ok: false, error: `Invalid square name '${name}': file '${file}' is outside a-h` };
  }
  if (!isRankDigit(rank)) {
    return { ok: false, error: `Invalid square name '${name}': rank '${rank}' is outside 1-8` };
  }
  const c = FILES.indexOf(file);
  const r = BOARD_SIZE - Number(rank);
  return { ok: true, square: { r, c }, name: `${file}${rank}` };
}

export function rowColToSquare(r: number, c: number): SquareParseResult {
  if (!Number.isInteger(r) || !Number.isInteger(c) || !inBounds(r, c)) {
    return { ok: false, error: `Square coordinates out of bounds: r=${r} c=${c}` };
  }
  const square = { r, c };
  return { ok: true, square, name: squareToName(square) };
}

export function isSquareName(name: string): name is SquareName {
  return nameToSquare(name).ok;
}

export const ALL_SQUARES: readonly Square[] = (() => {
  const out: Square[] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) out.push({ r, c });
  }
  return out;
})();

/** Row-major index, used to order move lists. */
export function squareIndex(sq: Square): number {
  return sq.r * BOARD_SIZE + sq.c;
}
