import { CONFIG } from '../config/constants';

export interface RetryPolicy {
  // Total attempts per request, including the first; Infinity never gives up
  maxAttempts: number;
  rateLimitDelayMs: number;
  errorDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: Number.POSITIVE_INFINITY,
  rateLimitDelayMs: CONFIG.TIMING.RATE_LIMIT_DELAY_MS,
  errorDelayMs: CONFIG.TIMING.ERROR_DELAY_MS
});

export const createRetryPolicy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!(policy.maxAttempts >= 1)) {
    throw new RangeError(`maxAttempts must be at least 1, got ${policy.maxAttempts}`);
  }
  if (policy.rateLimitDelayMs < 0 || policy.errorDelayMs < 0) {
    throw new RangeError('Retry delays cannot be negative');
  }
  return policy;
};

export type AttemptOutcome =
  | { kind: 'accepted' }
  | { kind: 'rate-limited' }
  | { kind: 'auth-rejected'; status: number }
  | { kind: 'failed'; status?: number };

export const classifyStatus = (status: number): AttemptOutcome => {
  if (status === CONFIG.HTTP.OK) return { kind: 'accepted' };
  if (status === CONFIG.HTTP.TOO_MANY_REQUESTS) return { kind: 'rate-limited' };
  if (status === CONFIG.HTTP.UNAUTHORIZED || status === CONFIG.HTTP.FORBIDDEN) {
    return { kind: 'auth-rejected', status };
  }
  return { kind: 'failed', status };
};

// Delay before the next attempt after a non-accepted outcome
export const retryDelay = (policy: RetryPolicy, outcome: AttemptOutcome): number => {
  return outcome.kind === 'rate-limited' ? policy.rateLimitDelayMs : policy.errorDelayMs;
};
