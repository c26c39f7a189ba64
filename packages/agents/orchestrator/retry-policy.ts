// Retry policy for stage invocations
// Exponential backoff: baseDelayMs * 2^(attempt-1), capped at maxDelayMs

import type { FailureKind } from '../types/errors.js';

export interface RetryPolicy {
  /** Total attempts per stage, including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt (default: 500ms) */
  baseDelayMs: number;
  /** Upper bound on any single delay (default: 8s) */
  maxDelayMs: number;
  /** Ceiling for one attempt; an attempt that exceeds it counts as transient (default: 120s) */
  stageTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  stageTimeoutMs: 120_000,
};

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer (got ${policy.maxAttempts})`);
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0) {
    throw new RangeError('retry delays must not be negative');
  }
  if (!(policy.stageTimeoutMs > 0)) {
    throw new RangeError(`stageTimeoutMs must be positive (got ${policy.stageTimeoutMs})`);
  }
  return policy;
}

/** Retry only transient failures, and only while attempts remain */
export function shouldRetry(kind: FailureKind, attempt: number, policy: RetryPolicy): boolean {
  return kind === 'transient' && attempt < policy.maxAttempts;
}

/** Delay to wait after the given (1-based) failed attempt */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(delay, policy.maxDelayMs);
}
