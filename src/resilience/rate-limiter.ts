/**
 * Newsbrief — Rate Limiter
 *
 * Sliding-window limiter: at most `maxCalls` admissions within any trailing
 * `windowSeconds`. `acquire()` only reports how long a caller would have to
 * wait; `schedule()` and `wrap()` do the waiting and then run the operation.
 */

import type { RateLimiterStatus } from '../types';
import { systemClock, type Clock } from '../lib/clock';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ module: 'rate-limiter' });

export interface RateLimiterOptions {
  maxCalls: number;
  windowSeconds: number;
  name?: string;
  clock?: Clock;
}

export class RateLimiter {
  readonly name: string;
  readonly maxCalls: number;
  readonly windowSeconds: number;

  private readonly clock: Clock;
  /** Admission timestamps (ms), oldest first */
  private readonly admissions: number[] = [];
  /** Tail of the waiters queue; each waiter runs after the previous one is admitted */
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxCalls) || options.maxCalls < 1) {
      throw new RangeError(`maxCalls must be a positive integer, got ${options.maxCalls}`);
    }
    if (!(options.windowSeconds > 0)) {
      throw new RangeError(`windowSeconds must be positive, got ${options.windowSeconds}`);
    }

    this.maxCalls = options.maxCalls;
    this.windowSeconds = options.windowSeconds;
    this.name = options.name ?? 'limiter';
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Try to take a slot. Returns 0 when admitted (the admission is recorded),
   * otherwise the seconds until the oldest admission leaves the window.
   * Synchronous, so it cannot interleave with another caller.
   */
  acquire(): number {
    const now = this.clock.now();
    this.evictExpired(now);

    if (this.admissions.length >= this.maxCalls) {
      const oldest = this.admissions[0];
      return Math.max(0, (this.windowSeconds * 1000 - (now - oldest)) / 1000);
    }

    this.admissions.push(now);
    return 0;
  }

  /**
   * Wait for a slot, then run `operation`. Waiters are admitted in call order.
   */
  async schedule<T>(operation: () => Promise<T>): Promise<T> {
    await this.reserve();
    return operation();
  }

  /**
   * Rate-limited version of `fn`.
   */
  wrap<A extends unknown[], R>(fn: (...args: A) => Promise<R>): (...args: A) => Promise<R> {
    return (...args: A) => this.schedule(() => fn(...args));
  }

  status(): RateLimiterStatus {
    this.evictExpired(this.clock.now());
    return {
      name: this.name,
      maxCalls: this.maxCalls,
      windowSeconds: this.windowSeconds,
      inWindow: this.admissions.length,
    };
  }

  private reserve(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    this.queue = turn.catch((error: unknown) => {
      log.warn('Rate limiter wait failed', { limiter: this.name, error: errorMessage(error) });
    });
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const waitSeconds = this.acquire();
      if (waitSeconds === 0) return;

      log.debug('Rate limit reached, waiting', {
        limiter: this.name,
        waitSeconds: Number(waitSeconds.toFixed(2)),
      });
      await this.clock.sleep(waitSeconds * 1000);
    }
  }

  // An admission exactly one window old no longer counts
  private evictExpired(now: number): void {
    const cutoff = now - this.windowSeconds * 1000;
    while (this.admissions.length > 0 && this.admissions[0] <= cutoff) {
      this.admissions.shift();
    }
  }
}

// ============================================================
// PRESETS
// ============================================================

export interface DefaultLimiters {
  /** LLM requests: 60 per minute */
  llm: RateLimiter;
  /** NewsAPI free tier: 100 per day */
  newsApi: RateLimiter;
  /** GNews free tier: 100 per day */
  gnews: RateLimiter;
}

export function createDefaultLimiters(clock: Clock = systemClock): DefaultLimiters {
  return {
    llm: new RateLimiter({ name: 'llm', maxCalls: 60, windowSeconds: 60, clock }),
    newsApi: new RateLimiter({ name: 'newsapi', maxCalls: 100, windowSeconds: 86_400, clock }),
    gnews: new RateLimiter({ name: 'gnews', maxCalls: 100, windowSeconds: 86_400, clock }),
  };
}
