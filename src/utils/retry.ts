/**
 * Bounded fixed-interval retry
 *
 * Features:
 * - Fixed interval between attempts, bounded attempt count
 * - Per-attempt timeout (the attempt's AbortSignal fires when it elapses)
 * - Optional overall deadline
 * - Injectable sleep/clock for tests
 */

import type { Logger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

export interface RetryConfig {
  /** Total attempts, including the first (default: 50) */
  maxAttempts?: number;
  /** Wait between attempts in ms (default: 3000) */
  intervalMs?: number;
  /** Bound on a single attempt in ms (default: none) */
  attemptTimeoutMs?: number;
  /** Bound on the whole operation in ms, measured from the first attempt */
  deadlineMs?: number;
}

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryConfig {
  logger?: Logger;
  /** Label used in log lines */
  label?: string;
  /** Called before each wait */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Return false to stop retrying immediately */
  isRetryable?: (error: Error) => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Outcome of a retried operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'attemptTimeoutMs' | 'deadlineMs'>> = {
  maxAttempts: 50,
  intervalMs: 3000,
};

/**
 * Thrown into an attempt that ran past its own timeout
 */
export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Run one attempt, aborting it when `timeoutMs` elapses
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined) {
    return fn(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Execute a function until it succeeds or the attempt budget runs out
 *
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts);
  const intervalMs = options.intervalMs ?? DEFAULT_RETRY_CONFIG.intervalMs;
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const log = options.logger;
  const label = options.label ?? 'operation';

  const startTime = now();
  let lastError: Error = new Error(`${label} was not attempted`);
  let attempt = 0;

  while (attempt < maxAttempts) {
    attempt++;
    try {
      const data = await withTimeout((signal) => fn(signal, attempt), options.attemptTimeoutMs);
      const totalTimeMs = now() - startTime;
      if (attempt > 1) {
        log?.debug(`${label} succeeded after ${attempt} attempts`, { attempts: attempt, totalTimeMs });
      }
      return { success: true, data, attempts: attempt, totalTimeMs };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (options.isRetryable && !options.isRetryable(lastError)) {
        log?.debug(`${label} failed with a non-retryable error`, { error: lastError.message, attempts: attempt });
        break;
      }
      if (attempt >= maxAttempts) {
        log?.warn(`${label}: all ${maxAttempts} attempts exhausted`, { error: lastError.message });
        break;
      }
      if (options.deadlineMs !== undefined && now() - startTime + intervalMs > options.deadlineMs) {
        log?.warn(`${label}: deadline of ${options.deadlineMs}ms reached`, { attempts: attempt });
        break;
      }

      log?.debug(`${label}: attempt ${attempt}/${maxAttempts} failed, retrying in ${intervalMs}ms`, {
        error: lastError.message,
      });
      options.onRetry?.(attempt, lastError, intervalMs);
      await wait(intervalMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: attempt,
    totalTimeMs: now() - startTime,
  };
}
