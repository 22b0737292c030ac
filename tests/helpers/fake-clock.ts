/**
 * Manual clock for tests. `sleep` advances time instantly and records the
 * requested duration.
 */

import type { Clock } from '../../src/lib/clock';

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
