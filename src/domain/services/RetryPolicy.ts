import { TransientServiceError } from '../errors/LedgerReportError.js';

export interface RetryPolicyOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxJitterMs: number;
}

// 4 retries => 5 attempts. One time unit is one second.
export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxRetries: 4,
  baseDelayMs: 1_000,
  maxJitterMs: 1_000,
};

export type RetryDecision = { action: 'retry'; delayMs: number; attempt: number } | { action: 'abort' };

export const isTransient = (error: unknown): error is TransientServiceError => error instanceof TransientServiceError;

/**
 * Decides what to do after attempt `attempt` (zero-based) failed with `error`.
 * Anything that is not a transient service error is permanent and aborts at once.
 * `random` must return a value in [0, 1).
 */
export const decideRetry = (
  error: unknown,
  attempt: number,
  random: () => number = Math.random,
  options: RetryPolicyOptions = DEFAULT_RETRY_POLICY,
): RetryDecision => {
  if (!isTransient(error) || attempt >= options.maxRetries) {
    return { action: 'abort' };
  }

  const jitter = random() * options.maxJitterMs;
  return {
    action: 'retry',
    delayMs: options.baseDelayMs * 2 ** attempt + jitter,
    attempt,
  };
};
