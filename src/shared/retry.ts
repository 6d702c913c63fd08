/**
 * Retry helper for outbound delivery (report posts, gateway login).
 *
 * Exponential backoff with optional jitter. The tracker core never retries
 * store calls; only the messaging edge uses this.
 */

export interface RetryOptions {
  /** Maximum number of retry attempts after the first call. Defaults to 2. */
  maxRetries?: number;
  /** Delay before the first retry in milliseconds. Defaults to 1000. */
  initialDelayMs?: number;
  /** Multiplier applied to the delay after each retry. Defaults to 2. */
  backoffMultiplier?: number;
  /** Upper bound for a single delay in milliseconds. Defaults to 15000. */
  maxDelayMs?: number;
  /** Randomize each delay within 50%–150%. Defaults to true. */
  jitter?: boolean;
  /** Decide whether an error is worth another attempt. Defaults to always. */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry with the failing error. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Describes the operation in the final error message. */
  label?: string;
  /** Waits between attempts; replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
}

export class RetryError extends Error {
  /** The last error that caused the final failure. */
  readonly cause: unknown;
  /** Total number of attempts made (initial + retries). */
  readonly attempts: number;

  constructor(message: string, cause: unknown, attempts: number) {
    super(message);
    this.name = "RetryError";
    this.cause = cause;
    this.attempts = attempts;
  }
}

/**
 * Run `fn`, retrying failures with exponential backoff.
 *
 * @throws RetryError once every attempt failed or an error is not retryable.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 2,
    initialDelayMs = 1000,
    backoffMultiplier = 2,
    maxDelayMs = 15_000,
    jitter = true,
    isRetryable = () => true,
    onRetry,
    label = "operation",
    sleep = defaultSleep,
  } = options;

  let lastError: unknown;
  let attempts = 0;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    attempts = attempt + 1;
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || !isRetryable(error)) {
        break;
      }

      const actualDelay = jitter ? delay * (0.5 + Math.random()) : delay;
      onRetry?.(error, attempt + 1, actualDelay);
      await sleep(actualDelay);
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }

  const detail = lastError instanceof Error ? lastError.message : String(lastError);
  throw new RetryError(
    `${label} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${detail}`,
    lastError,
    attempts,
  );
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
