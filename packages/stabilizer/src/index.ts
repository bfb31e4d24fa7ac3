/**
 * Resonance Stabilizer — bounded vectors pulled toward a source.
 *
 * Each update moves a vector toward the source, damped by how aligned it
 * already is, then clamps every component back into [-1, 1].
 */

export const VERSION = '0.1.0';

// ─── Stabilizing Vector ──────────────────────────────────────────
export {
  StabilizingVector,
  create,
  update,
  DEFAULT_DIMENSIONALITY,
  DEFAULT_FACTOR,
  DEFAULT_EPSILON,
} from './stabilizing-vector.js';
export type { FromComponentsOptions } from './stabilizing-vector.js';

// ─── Config ──────────────────────────────────────────────────────
export {
  parseStabilizerConfig,
  validateStabilizerConfig,
  loadStabilizerConfig,
  createFromConfig,
  defaultStabilizerConfig,
  CONFIG_ENV_VAR,
} from './config.js';

// ─── Errors ──────────────────────────────────────────────────────
export { StabilizerError, InvalidConfigurationError, DimensionMismatchError } from './errors.js';
export type { StabilizerErrorCode } from './errors.js';

// ─── Randomness & Math ───────────────────────────────────────────
export { defaultRandom, createSeededRandom, uniformComponent, isValidSeed, MAX_SEED } from './random.js';
export { dot, clamp, clampAll, mean, LOWER_BOUND, UPPER_BOUND } from './vector-math.js';

// ─── Types ───────────────────────────────────────────────────────
export type {
  Vector,
  SourceVector,
  RandomSource,
  StabilizerConfig,
  ConfigParseResult,
  StabilizationStep,
} from '@resonance/shared';
