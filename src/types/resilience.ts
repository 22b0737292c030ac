/**
 * Newsbrief — Resilience Types
 *
 * Snapshots reported by the cache, limiters and circuit breakers.
 */

export type CircuitStateName = 'closed' | 'open' | 'half_open';

export interface CircuitSnapshot {
  name: string;
  state: CircuitStateName;
  failures: number;
  threshold: number;
  recoveryTimeoutSeconds: number;
  /** ISO timestamp of the last recorded failure, if any */
  lastFailureAt: string | null;
}

export interface RateLimiterStatus {
  name: string;
  maxCalls: number;
  windowSeconds: number;
  /** Admissions currently inside the window */
  inWindow: number;
}

export interface CacheStats {
  directory: string;
  entries: number;
  bytes: number;
}
