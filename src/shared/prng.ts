export type Prng = {
  nextFloat(): number; // [0,1)
  int(min: number, maxExclusive: number): number;
  /** Uniform element, or null for an empty list. */
  pick<T>(arr: readonly T[]): T | null;
};

export type Seed = number | string;

function fnv1a32(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Mulberry32.
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seedToUint32(seed: Seed): number {
  return typeof seed === "string" ? fnv1a32(seed) : seed >>> 0;
}

/** Seeded when `seed` is given; otherwise seeded once from `Math.random`. */
export function createPrng(seed?: Seed): Prng {
  const seed32 = seed === undefined ? Math.floor(Math.random() * 0x1_0000_0000) >>> 0 : seedToUint32(seed);
  const next = mulberry32(seed32);

  const api: Prng = {
    nextFloat: () => next(),
    int: (min: number, maxExclusive: number) => {
      const lo = Math.floor(min);
      const hi = Math.floor(maxExclusive);
      if (!Number.isFinite(lo) || !Number.isFinite(hi) || hi <= lo) return lo;
      return lo + Math.floor(next() * (hi - lo));
    },
    pick: <T,>(arr: readonly T[]): T | null => {
      if (arr.length === 0) return null;
      return arr[api.int(0, arr.length)] ?? null;
    },
  };

  return api;
}
