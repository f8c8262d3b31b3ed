import type { RandomSource } from '../engine/types';

/**
 * Deterministic RandomSource from a 32-bit seed (mulberry32).
 *
 * Two boards initialized from the same seed, dimensions, mine count and
 * first click lay identical mines. Not suitable for anything security
 * related.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Random non-negative 31-bit seed for a new game. */
export function generateGameSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
