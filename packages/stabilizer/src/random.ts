/**
 * Random Sources
 *
 * Construction samples through an injected RandomSource rather than the
 * global generator. Pass createSeededRandom(seed) to replay a run.
 */

import type { RandomSource } from '@resonance/shared';
import { InvalidConfigurationError } from './errors.js';

export const defaultRandom: RandomSource = () => Math.random();

export const MAX_SEED = 0x7fffffff;

export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED;
}

/**
 * xorshift32. Seeds in [0, MAX_SEED] start from state seed + 1, which keeps
 * the state non-zero and gives every seed its own sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  if (!isValidSeed(seed)) {
    throw new InvalidConfigurationError(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
  let x = seed + 1;
  return () => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 4294967296;
  };
}

/**
 * Uniform draw in [-1, 1].
 */
export function uniformComponent(random: RandomSource): number {
  return -1 + 2 * random();
}
