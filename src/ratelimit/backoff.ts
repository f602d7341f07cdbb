import type { RateLimitConfig } from '../config';

export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
  jitterMs: number;
  maxAttempts: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  baseMs: 1000,
  capMs: 30000,
  jitterMs: 250,
  maxAttempts: 5
};

export function backoffPolicyFromConfig(config: RateLimitConfig): BackoffPolicy {
  return {
    baseMs: config.backoff_base_ms,
    capMs: config.backoff_cap_ms,
    jitterMs: config.backoff_jitter_ms,
    maxAttempts: Math.max(1, config.max_attempts)
  };
}

export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const exponential = Math.min(policy.capMs, policy.baseMs * 2 ** exponent);
  const jitter = Math.floor(random() * policy.jitterMs);
  return exponential + jitter;
}
