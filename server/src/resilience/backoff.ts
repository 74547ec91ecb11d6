/**
 * Exponential backoff shared by the verification and role clients.
 */
export interface BackoffPolicy {
  /** Delay after the first failed attempt */
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Total attempts, including the first one */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialDelayMs: 250,
  multiplier: 2,
  maxDelayMs: 4_000,
  maxAttempts: 5,
};

/**
 * Create a backoff policy, filling unspecified fields from the defaults.
 */
export function createBackoffPolicy(overrides: Partial<BackoffPolicy> = {}): BackoffPolicy {
  const policy = { ...DEFAULT_BACKOFF, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < 0 || policy.multiplier < 1) {
    throw new RangeError('Backoff delays must be non-negative and the multiplier at least 1');
  }
  return policy;
}

/**
 * Delay to wait after the given failed attempt (1-based).
 */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  return Math.min(delay, policy.maxDelayMs);
}
