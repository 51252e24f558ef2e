/**
 * Seeds
 *
 * A seed is an unsigned 32-bit integer advanced by a linear congruential
 * step. Every generator takes a seed and hands back the next one, so one
 * starting seed reproduces a whole run.
 */

export type Seed = number;

const LCG_MULTIPLIER = 1664525;
const LCG_INCREMENT = 1013904223;
const GOLDEN_GAMMA = 0x9e3779b9;
const TWO_POW_32 = 0x100000000;

/** Normalize any number to a seed (truncated, wrapped to 32 bits). */
export function mkSeed(n: number): Seed {
  return n >>> 0;
}

export function nextSeed(seed: Seed): Seed {
  return (Math.imul(seed, LCG_MULTIPLIER) + LCG_INCREMENT) >>> 0;
}

/** Map a seed to a float in [0, 1). */
export function toUnit(seed: Seed): number {
  return seed / TWO_POW_32;
}

/**
 * Mix an integer into a seed. Distinct `n` send the same seed down distinct
 * streams; this is the primitive every `Coarbitrary` is built from.
 */
export function perturbSeed(seed: Seed, n: number): Seed {
  return nextSeed((seed ^ Math.imul(n | 0, GOLDEN_GAMMA)) >>> 0);
}

/** Two independent seeds from one. */
export function splitSeed(seed: Seed): readonly [Seed, Seed] {
  const left = nextSeed(seed);
  return [left, perturbSeed(left, 1)];
}
