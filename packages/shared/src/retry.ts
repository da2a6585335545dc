/**
 * Retry with exponential backoff for idempotent RPC reads.
 * Writes (transactions) are never retried: a failed conversion aborts the request.
 */

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2, capped at 5) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 200) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 2000) */
  maxDelayMs?: number;
  /** Decides whether an error is worth another attempt (default: isTransientError) */
  isRetryable?: (error: unknown) => boolean;
  /** Optional abort signal */
  signal?: AbortSignal;
}

const MAX_RETRIES_CEILING = 5;

const TRANSIENT_PATTERNS = [
  'timeout',
  'aborted',
  'econnreset',
  'econnrefused',
  'network',
  'socket hang up',
  'fetch failed',
  '429',
  '502',
  '503',
  '504',
];

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => message.includes(p));
}

function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }

    const timeout = setTimeout(resolve, ms);

    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timeout);
        reject(new Error('Aborted'));
      },
      { once: true },
    );
  });
}

export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const message = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Retry exhausted after ${attempts} attempts: ${message}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or attempts run out.
 * Non-retryable errors are re-thrown as they are; exhaustion throws RetryExhaustedError.
 */
export async function withRetries<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    baseDelayMs = 200,
    maxDelayMs = 2_000,
    isRetryable = isTransientError,
    signal,
  } = options;
  const maxRetries = Math.min(options.maxRetries ?? 2, MAX_RETRIES_CEILING);

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) throw new Error('Aborted');

    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!isRetryable(error)) throw error;
      if (attempt === maxRetries) break;
      await sleep(backoffDelay(attempt, baseDelayMs, maxDelayMs), signal);
    }
  }

  throw new RetryExhaustedError(maxRetries + 1, lastError);
}
