// ═══════════════════════════════════════════════════════════════════════════════
// RANDOM SOURCE — Injectable, Seedable Uniform Generator
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Uniform source of floats in `[0, 1)`.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Process entropy via Math.random.
 */
export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic mulberry32 generator. Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Seeded source when a seed is configured, system entropy otherwise.
 */
export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? systemRandom : createSeededRandom(seed);
}
