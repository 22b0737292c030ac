/**
 * Newsbrief — Circuit Breaker
 *
 * Stops calling an upstream that keeps failing.
 *
 *   closed ──(failures >= threshold)──▶ open
 *   open ──(next call after recovery timeout)──▶ half_open
 *   half_open ──(trial succeeds)──▶ closed
 *   half_open ──(trial fails)──▶ open
 *
 * While open, calls are rejected with CircuitOpenError and the operation is
 * not invoked. The open -> half_open move happens lazily, on the first call
 * after the timeout; exactly one trial call runs while half-open.
 *
 * Breakers are shared by name through a CircuitBreakerRegistry, which is
 * passed to whoever needs it rather than living in module state.
 */

import type { CircuitSnapshot, CircuitStateName } from '../types';
import { systemClock, type Clock } from '../lib/clock';
import { CircuitOpenError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ module: 'circuit-breaker' });

const ALLOWED_TRANSITIONS: Record<CircuitStateName, CircuitStateName[]> = {
  closed: ['open'],
  open: ['half_open'],
  half_open: ['closed', 'open'],
};

export interface CircuitBreakerOptions {
  /** Consecutive failures that trip the breaker (default 3) */
  failureThreshold?: number;
  /** Seconds to stay open before allowing a trial call (default 60) */
  recoveryTimeoutSeconds?: number;
}

export class CircuitBreaker {
  readonly failureThreshold: number;
  readonly recoveryTimeoutSeconds: number;

  private state: CircuitStateName = 'closed';
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;
  private trialInFlight = false;

  constructor(
    readonly name: string,
    options: CircuitBreakerOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.failureThreshold = options.failureThreshold ?? 3;
    this.recoveryTimeoutSeconds = options.recoveryTimeoutSeconds ?? 60;

    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be a positive integer, got ${this.failureThreshold}`);
    }
    if (this.recoveryTimeoutSeconds < 0) {
      throw new RangeError(`recoveryTimeoutSeconds must not be negative, got ${this.recoveryTimeoutSeconds}`);
    }
  }

  get currentState(): CircuitStateName {
    return this.state;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Run `operation` through the breaker. Rejects with CircuitOpenError
   * without calling it when the circuit is open; otherwise settles with
   * whatever the operation settles with.
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const isTrial = this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }

    this.recordSuccess(isTrial);
    return result;
  }

  wrap<A extends unknown[], R>(fn: (...args: A) => Promise<R>): (...args: A) => Promise<R> {
    return (...args: A) => this.execute(() => fn(...args));
  }

  snapshot(): CircuitSnapshot {
    return {
      name: this.name,
      state: this.state,
      failures: this.consecutiveFailures,
      threshold: this.failureThreshold,
      recoveryTimeoutSeconds: this.recoveryTimeoutSeconds,
      lastFailureAt: this.lastFailureAt === null ? null : new Date(this.lastFailureAt).toISOString(),
    };
  }

  /**
   * Throws CircuitOpenError when the call may not run. Returns true when the
   * admitted call is the half-open trial.
   */
  private admit(): boolean {
    if (this.state === 'open') {
      const elapsedMs = this.clock.now() - (this.lastFailureAt ?? 0);
      const timeoutMs = this.recoveryTimeoutSeconds * 1000;

      if (elapsedMs <= timeoutMs) {
        log.warn('Call blocked, circuit is open', { circuit: this.name });
        throw new CircuitOpenError(this.name, (timeoutMs - elapsedMs) / 1000);
      }

      this.transition('half_open');
      log.info('Circuit half-open, trying one call', { circuit: this.name });
    } else if (this.state === 'half_open' && this.trialInFlight) {
      throw new CircuitOpenError(this.name, 0);
    }

    if (this.state === 'half_open') {
      this.trialInFlight = true;
      return true;
    }
    return false;
  }

  private recordSuccess(isTrial: boolean): void {
    if (this.state === 'half_open' && isTrial) {
      this.transition('closed');
      this.consecutiveFailures = 0;
      log.info('Circuit recovered, now closed', { circuit: this.name });
    } else if (this.state === 'closed') {
      this.consecutiveFailures = 0;
    }
    // Late successes from calls admitted while closed leave open and half_open alone
  }

  private recordFailure(error: unknown): void {
    this.consecutiveFailures++;
    this.lastFailureAt = this.clock.now();

    log.error(`${this.name} call failed (${this.consecutiveFailures}/${this.failureThreshold})`, {
      circuit: this.name,
      error: errorMessage(error),
    });

    if (this.state === 'half_open') {
      this.transition('open');
      log.error('Trial call failed, circuit open again', { circuit: this.name });
    } else if (this.state === 'closed' && this.consecutiveFailures >= this.failureThreshold) {
      this.transition('open');
      log.error('Circuit tripped to open', { circuit: this.name });
    }
  }

  private transition(to: CircuitStateName): void {
    if (!ALLOWED_TRANSITIONS[this.state].includes(to)) {
      throw new Error(`Illegal circuit transition ${this.state} -> ${to} (${this.name})`);
    }
    this.state = to;
    if (to !== 'half_open') {
      this.trialInFlight = false;
    }
  }
}

// ============================================================
// REGISTRY
// ============================================================

/**
 * Named breakers with get-or-create semantics. The options given by the
 * first caller for a name are the ones that stick.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly clock: Clock = systemClock) {}

  get(name: string, options: CircuitBreakerOptions = {}): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const breaker = new CircuitBreaker(name, options, this.clock);
    this.breakers.set(name, breaker);
    log.debug('Circuit registered', {
      circuit: name,
      threshold: breaker.failureThreshold,
      recoveryTimeoutSeconds: breaker.recoveryTimeoutSeconds,
    });
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  status(): CircuitSnapshot[] {
    return Array.from(this.breakers.values(), breaker => breaker.snapshot());
  }
}
