import { describe, expect, it } from 'vitest';

import { backoffPolicyFromConfig, computeBackoffDelay, DEFAULT_BACKOFF_POLICY } from '../../src/ratelimit/backoff';

describe('computeBackoffDelay', () => {
  const noJitter = () => 0;

  it('doubles the base delay per attempt', () => {
    expect(computeBackoffDelay(1, DEFAULT_BACKOFF_POLICY, noJitter)).toBe(1000);
    expect(computeBackoffDelay(2, DEFAULT_BACKOFF_POLICY, noJitter)).toBe(2000);
    expect(computeBackoffDelay(3, DEFAULT_BACKOFF_POLICY, noJitter)).toBe(4000);
  });

  it('caps the exponential part', () => {
    expect(computeBackoffDelay(6, DEFAULT_BACKOFF_POLICY, noJitter)).toBe(30000);
    expect(computeBackoffDelay(12, DEFAULT_BACKOFF_POLICY, noJitter)).toBe(30000);
  });

  it('adds jitter on top of the capped delay', () => {
    expect(computeBackoffDelay(1, DEFAULT_BACKOFF_POLICY, () => 0.5)).toBe(1125);
    expect(computeBackoffDelay(6, DEFAULT_BACKOFF_POLICY, () => 0.5)).toBe(30125);
  });

  it('reads the policy from settings', () => {
    const policy = backoffPolicyFromConfig({
      min_interval_ms: 100,
      max_attempts: 0,
      backoff_base_ms: 200,
      backoff_cap_ms: 800,
      backoff_jitter_ms: 0
    });

    expect(policy).toEqual({ baseMs: 200, capMs: 800, jitterMs: 0, maxAttempts: 1 });
    expect(computeBackoffDelay(4, policy, noJitter)).toBe(800);
  });
});
