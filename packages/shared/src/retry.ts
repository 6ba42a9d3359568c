/**
 * Bounded retry with fixed or exponential backoff.
 */
import { setTimeout as sleep } from 'node:timers/promises';

export type BackoffKind = 'fixed' | 'exponential';

export interface RetryPolicy {
  /** Total attempts including the first (min 1) */
  maxAttempts: number;
  /** Delay before the second attempt */
  delayMs: number;
  /** Default: exponential */
  backoff?: BackoffKind;
  /** Upper bound for exponential delays (default: 30000) */
  maxDelayMs?: number;
}

export interface RetryOptions extends RetryPolicy {
  /** Decide whether a failure is worth another attempt (default: always) */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (info: { err: unknown; attempt: number; delayMs: number }) => void;
  /** Aborting stops waiting between attempts */
  signal?: AbortSignal;
}

/** Delay to wait after the given (1-based) failed attempt */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === 'fixed') return policy.delayMs;
  const maxDelay = policy.maxDelayMs ?? 30_000;
  return Math.min(policy.delayMs * 2 ** (attempt - 1), maxDelay);
}

export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || opts.signal?.aborted) throw err;
      if (opts.shouldRetry && !opts.shouldRetry(err, attempt)) throw err;

      const delayMs = backoffDelay(opts, attempt);
      opts.onRetry?.({ err, attempt, delayMs });
      if (delayMs > 0) {
        await sleep(delayMs, undefined, { signal: opts.signal });
      }
    }
  }
}
