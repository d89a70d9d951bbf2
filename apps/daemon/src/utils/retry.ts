import { Result } from '@chorus/shared';
import { RetryPolicy } from '../domain/playback/types';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Outcome of a retry loop that ran out of attempts
 */
export interface RetryExhausted<E> {
  readonly attempts: number;
  readonly lastError: E;
}

export interface RetryHooks<E> {
  sleep?: Sleep;
  onRetry?: (error: E, attempt: number, delayMs: number) => void;
}

/**
 * Delay before retry number `retry` (1-based): initial * multiplier^(retry-1),
 * capped at maxDelayMs when one is set
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, retry - 1);
  return policy.maxDelayMs === undefined ? delay : Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds or `policy.maxAttempts` attempts failed.
 * Waits between attempts only, never after the last one.
 */
export async function retryWithBackoff<T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  policy: RetryPolicy,
  hooks: RetryHooks<E> = {}
): Promise<Result<T, RetryExhausted<E>>> {
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  let attempt = 1;
  for (;;) {
    const outcome = await operation(attempt);
    if (outcome.success) {
      return outcome;
    }

    if (attempt >= maxAttempts) {
      return { success: false, error: { attempts: attempt, lastError: outcome.error } };
    }

    const delayMs = backoffDelay(policy, attempt);
    hooks.onRetry?.(outcome.error, attempt, delayMs);
    await wait(delayMs);
    attempt++;
  }
}
