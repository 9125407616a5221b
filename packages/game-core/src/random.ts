// packages/game-core/src/random.ts
//
// Pluggable random sources for puzzle generation.
// A RandomSource behaves like Math.random: each call returns a float in [0, 1).

export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** FNV-1a 32-bit hash of a string. */
export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * seededRandom returns a deterministic mulberry32 stream for a seed,
 * so every installation sharing a seed gets the same daily puzzle.
 */
export function seededRandom(seed: string): RandomSource {
  let a = hashSeed(seed);
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number) {
  return min + Math.floor(random() * (max - min + 1));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}
