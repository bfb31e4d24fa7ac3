/**
 * Vector Math — the handful of elementwise operations the update rule needs.
 * Callers check lengths; these functions assume they match.
 */

export const LOWER_BOUND = -1.0;
export const UPPER_BOUND = 1.0;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Standard inner product. Not normalized.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function subtract(a: readonly number[], b: readonly number[]): number[] {
  return a.map((v, i) => v - b[i]);
}

export function clampAll(values: readonly number[]): number[] {
  return values.map(v => clamp(v, LOWER_BOUND, UPPER_BOUND));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}
