/**
 * Stabilizing Vector — a bounded vector pulled toward a source.
 *
 * Each update moves the components toward the source by
 * `direction * stabilityFactor * factor`, where the stability factor shrinks
 * from 1.0 to 0.5 as the raw coherence (dot product) rises from 0 to 1.
 * The stability factor never drops below 0.5, so repeated updates approach the source
 * without reaching it. Components are clamped to [-1, 1] after every step.
 *
 * Coherence is clipped raw, not normalized by dimensionality: any dot
 * product of 1 or more damps the step exactly as 1 does.
 */

import type { RandomSource, SourceVector, StabilizationStep, Vector } from '@resonance/shared';
import { DimensionMismatchError, InvalidConfigurationError } from './errors.js';
import { defaultRandom, uniformComponent } from './random.js';
import { LOWER_BOUND, UPPER_BOUND, clamp, clampAll, dot, mean as meanOf, subtract } from './vector-math.js';

export const DEFAULT_DIMENSIONALITY = 11;
export const DEFAULT_FACTOR = 0.1;
export const DEFAULT_EPSILON = 1e-6;

export interface FromComponentsOptions {
  expectedDimensionality?: number;
}

/**
 * 1 - clamp(coherence, 0, 1) / 2, in [0.5, 1].
 */
function stabilityFactorOf(coherence: number): number {
  return 1.0 - clamp(coherence, 0, 1) / 2.0;
}

/**
 * Unscaled update field G(v) = (source - v) * stabilityFactor(v).
 */
function updateField(values: readonly number[], source: SourceVector): Vector {
  const stabilityFactor = stabilityFactorOf(dot(values, source));
  return values.map((v, i) => (source[i] - v) * stabilityFactor);
}

function assertDimensionality(dimensionality: number): void {
  if (!Number.isInteger(dimensionality) || dimensionality <= 0) {
    throw new InvalidConfigurationError(
      `Dimensionality must be a positive integer, got ${dimensionality}`
    );
  }
}

export class StabilizingVector {
  private readonly values: Vector;

  private constructor(values: Vector) {
    this.values = values;
  }

  /**
   * Sample every component uniformly from [-1, 1].
   */
  static random(
    dimensionality: number = DEFAULT_DIMENSIONALITY,
    random: RandomSource = defaultRandom
  ): StabilizingVector {
    assertDimensionality(dimensionality);
    const values: Vector = [];
    for (let i = 0; i < dimensionality; i++) {
      values.push(uniformComponent(random));
    }
    return new StabilizingVector(values);
  }

  /**
   * Start from known components. Out-of-range values are clipped into bounds;
   * NaN and infinities are rejected.
   */
  static fromComponents(
    initial: readonly number[],
    opts?: FromComponentsOptions
  ): StabilizingVector {
    if (initial.length === 0) {
      throw new InvalidConfigurationError('Initial components must not be empty');
    }
    if (opts?.expectedDimensionality !== undefined) {
      assertDimensionality(opts.expectedDimensionality);
      if (initial.length !== opts.expectedDimensionality) {
        throw new DimensionMismatchError(opts.expectedDimensionality, initial.length);
      }
    }
    initial.forEach((v, i) => {
      if (!Number.isFinite(v)) {
        throw new InvalidConfigurationError(`Initial component ${i} must be finite, got ${v}`);
      }
    });
    return new StabilizingVector(clampAll(initial));
  }

  get dimensionality(): number {
    return this.values.length;
  }

  /** Live view of the components. Use toArray() for a snapshot. */
  get components(): readonly number[] {
    return this.values;
  }

  toArray(): Vector {
    return [...this.values];
  }

  /** Independent clone; updating one never moves the other. */
  copy(): StabilizingVector {
    return new StabilizingVector([...this.values]);
  }

  coherenceWith(source: SourceVector): number {
    this.assertSameLength(source);
    return dot(this.values, source);
  }

  /**
   * Compute one update without applying it.
   */
  planStep(source: SourceVector, factor: number = DEFAULT_FACTOR): StabilizationStep {
    this.assertSameLength(source);

    const coherence = dot(this.values, source);
    const clipped = clamp(coherence, 0, 1);
    const stabilityFactor = stabilityFactorOf(coherence);
    const direction = subtract(source, this.values);
    const displacement = direction.map(d => d * stabilityFactor * factor);

    return {
      coherence,
      clipped,
      stabilityFactor,
      direction,
      displacement,
      next: clampAll(this.values.map((v, i) => v + displacement[i])),
    };
  }

  /**
   * Pull the components toward `source`. Mutates in place.
   * Throws DimensionMismatchError before touching any component.
   */
  update(source: SourceVector, factor: number = DEFAULT_FACTOR): void {
    this.advance(source, factor);
  }

  /**
   * update(), returning the step it committed.
   */
  advance(source: SourceVector, factor: number = DEFAULT_FACTOR): StabilizationStep {
    const step = this.planStep(source, factor);
    for (let i = 0; i < this.values.length; i++) {
      this.values[i] = step.next[i];
    }
    return step;
  }

  /**
   * Divergence of the update field at the current components, by central
   * differences: sum over i of dG_i/dv_i. Negative means the flow contracts
   * phase-space volume around this point. Clamping is not part of the field.
   */
  divergence(source: SourceVector, epsilon: number = DEFAULT_EPSILON): number {
    this.assertSameLength(source);
    if (!(epsilon > 0)) {
      throw new InvalidConfigurationError(`Epsilon must be positive, got ${epsilon}`);
    }

    let total = 0;
    for (let i = 0; i < this.values.length; i++) {
      const plus = [...this.values];
      const minus = [...this.values];
      plus[i] += epsilon;
      minus[i] -= epsilon;
      total += (updateField(plus, source)[i] - updateField(minus, source)[i]) / (2 * epsilon);
    }
    return total;
  }

  mean(): number {
    return meanOf(this.values);
  }

  isWithinBounds(): boolean {
    return this.values.every(v => v >= LOWER_BOUND && v <= UPPER_BOUND);
  }

  toString(): string {
    return `StabilizingVector(dim=${this.dimensionality}, mean=${this.mean().toFixed(4)})`;
  }

  private assertSameLength(source: SourceVector): void {
    if (source.length !== this.values.length) {
      throw new DimensionMismatchError(this.values.length, source.length);
    }
  }
}

// ─── Functional surface ──────────────────────────────────────────

export function create(
  dimensionality: number = DEFAULT_DIMENSIONALITY,
  random: RandomSource = defaultRandom
): StabilizingVector {
  return StabilizingVector.random(dimensionality, random);
}

export function update(
  vector: StabilizingVector,
  source: SourceVector,
  factor: number = DEFAULT_FACTOR
): void {
  vector.update(source, factor);
}
