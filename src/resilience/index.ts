/**
 * Newsbrief — Resilience Module
 *
 * Cache, rate limiting, retries and circuit breaking for upstream calls.
 */

export { TtlCache, type TtlCacheOptions } from './cache';

export {
  RateLimiter,
  createDefaultLimiters,
  type RateLimiterOptions,
  type DefaultLimiters,
} from './rate-limiter';

export {
  withRetry,
  retryWithBackoff,
  backoffDelaySeconds,
  type RetryOptions,
} from './retry';

export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  type CircuitBreakerOptions,
} from './circuit-breaker';
