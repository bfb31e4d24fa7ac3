/**
 * Resonance Shared Types
 *
 * The stabilizing vector is the shared primitive. These types describe its
 * shape for every package in the workspace.
 */

// ─── Vectors ──────────────────────────────────────────────────────

/** Components of a stabilizing vector, each in [-1, 1]. */
export type Vector = number[];

/** Target supplied per update call. Read, never retained. */
export type SourceVector = readonly number[];

// ─── Randomness ───────────────────────────────────────────────────

/**
 * Returns a number in [0, 1). Injected wherever components are sampled,
 * so construction can be replayed under a fixed seed.
 */
export type RandomSource = () => number;

// ─── Configuration ────────────────────────────────────────────────

export interface StabilizerConfig {
  dimensionality: number;
  factor: number;
  seed: number | null;
}

export type ConfigParseResult =
  | { ok: true; config: StabilizerConfig; errors: string[] }
  | { ok: false; config: null; errors: string[] };

// ─── Stabilization ────────────────────────────────────────────────

export interface StabilizationStep {
  coherence: number;       // raw dot product, unbounded
  clipped: number;         // coherence clamped to [0, 1]
  stabilityFactor: number; // 1 - clipped / 2, in [0.5, 1]
  direction: Vector;
  displacement: Vector;    // movement applied, before clamping
  next: Vector;            // after clamping
}
