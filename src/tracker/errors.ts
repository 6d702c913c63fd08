/**
 * Error kinds raised by the tracker core.
 *
 * Duplicate joins, spurious leaves and empty intervals are not errors;
 * the engine treats them as no-ops.
 */

/** A bound passed to the interval splitter is not an absolute instant. */
export class InvalidIntervalError extends Error {
  readonly value: unknown;

  constructor(message: string, value: unknown) {
    super(message);
    this.name = "InvalidIntervalError";
    this.value = value;
  }
}

/** A persistence call failed. Never retried inside the core. */
export class StoreUnavailableError extends Error {
  readonly operation: string;
  readonly cause: unknown;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Store operation "${operation}" failed: ${detail}`);
    this.name = "StoreUnavailableError";
    this.operation = operation;
    this.cause = cause;
  }
}
