/**
 * Error classes for the roll-forward.
 *
 * Configuration errors are the caller's to fix; invariant violations mean a
 * defect in this code and halt processing.
 */

function describeValue(value: unknown): string {
  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Malformed or contradictory input, raised before any state is mutated.
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    public readonly field: string,
    public readonly value: unknown,
    reason: string,
  ) {
    super(`${field}: ${reason} (got ${describeValue(value)})`);
    this.name = 'ConfigurationError';
  }
}

/**
 * An internal identity failed to hold.
 */
export class InvariantViolationError extends Error {
  readonly code = 'INVARIANT_VIOLATION';

  constructor(
    public readonly invariant: string,
    message: string,
  ) {
    super(`Invariant "${invariant}" violated: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

/**
 * A snapshot file could not be read or does not have the expected shape.
 */
export class SnapshotError extends Error {
  readonly code = 'SNAPSHOT_ERROR';

  constructor(
    public readonly file: string,
    message: string,
  ) {
    super(`${file}: ${message}`);
    this.name = 'SnapshotError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
