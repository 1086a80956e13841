import { setTimeout as sleepFor } from 'node:timers/promises';
import type { BridgeErrorCode } from '../errors/error-codes.js';
import { ERROR_NETWORK_UNAVAILABLE } from '../errors/error-codes.js';
import { BridgeError } from '../errors/bridge-error.js';

/**
 * In-place retry policy shared by acquisition and dispatch
 */
export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  // Only errors with these codes are retried
  retryOn: readonly BridgeErrorCode[];
}

export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 0,
  backoffFactor: 1,
  retryOn: [],
};

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 1,
    initialDelayMs: 500,
    backoffFactor: 2,
    retryOn: [ERROR_NETWORK_UNAVAILABLE],
    ...overrides,
  };
}

export function isRetryable(policy: RetryPolicy, error: unknown): error is BridgeError {
  return error instanceof BridgeError && policy.retryOn.includes(error.code);
}

/**
 * Delay before attempt `attempt + 1` (attempts are 1-based)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1));
}

export interface RetryOptions {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: BridgeError, attempt: number, delayMs: number) => void;
}

/**
 * Run `operation` until it succeeds, throws a non-retryable error, or the
 * policy's attempts are used up (the last error is rethrown)
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? ((ms: number) => sleepFor(ms));
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !isRetryable(policy, err)) {
        throw err;
      }
      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
