/**
 * Stabilizer Errors
 *
 * Every failure the stabilizer raises carries a stable `code` so callers can
 * branch without matching on message text.
 */

export type StabilizerErrorCode = 'INVALID_CONFIGURATION' | 'DIMENSION_MISMATCH';

export class StabilizerError extends Error {
  readonly code: StabilizerErrorCode;

  constructor(code: StabilizerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a dimensionality or config document is unusable.
 */
export class InvalidConfigurationError extends StabilizerError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super('INVALID_CONFIGURATION', message);
    this.errors = errors;
  }
}

/**
 * Raised when a source vector's length differs from the entity's.
 */
export class DimensionMismatchError extends StabilizerError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super('DIMENSION_MISMATCH', `Vector dimension mismatch. Expected ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}
