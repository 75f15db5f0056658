/**
 * Seeded Random
 *
 * Jitter streams for organ placement. A stream is addressed by
 * (seed, salt, index): the salt names the organ type and the index the organ
 * within it.
 */

/**
 * A deterministic stream of draws.
 */
export interface RNG {
  /** Float in [0, 1) */
  next(): number;
  /** Float in [min, max) */
  range(min: number, max: number): number;
  /** Float in [-1, 1) */
  signed(): number;
  /** Integer in [min, max] */
  int(min: number, max: number): number;
}

/**
 * FNV-1a hash of a string to a 32-bit unsigned seed
 */
export function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * FNV-1a over the bytes of several 32-bit words
 */
export function hashWords(...words: number[]): number {
  let hash = 2166136261;
  for (const word of words) {
    const w = word >>> 0;
    for (let shift = 0; shift < 32; shift += 8) {
      hash ^= (w >>> shift) & 0xff;
      hash = Math.imul(hash, 16777619);
    }
  }
  return hash >>> 0;
}

/** Mulberry32 step over a single 32-bit state word */
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Stream for a numeric seed, or for a string hashed with `hashSeed`.
 */
export function createRng(seed: string | number): RNG {
  const next = mulberry32(typeof seed === "string" ? hashSeed(seed) : seed);
  return {
    next,
    range: (min, max) => min + next() * (max - min),
    signed: () => next() * 2 - 1,
    int: (min, max) => min + Math.floor(next() * (max - min + 1)),
  };
}

/**
 * Stream for one organ. Equal keys give equal streams regardless of draws
 * made from other streams.
 */
export function keyedRandom(seed: number, salt: number, index: number): RNG {
  return createRng(hashWords(seed, salt, index));
}
