export { RateLimiter, DEFAULT_MIN_INTERVAL_MS } from './rate-limiter';
export type { RateLimiterOptions } from './rate-limiter';
export { computeBackoffDelay, backoffPolicyFromConfig, DEFAULT_BACKOFF_POLICY } from './backoff';
export type { BackoffPolicy } from './backoff';
