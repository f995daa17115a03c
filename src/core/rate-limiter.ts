import { setTimeout as sleep } from 'node:timers/promises';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  }
};

const noop = (): void => undefined;

/**
 * Process-local pacing gate. Each `wait()` resolves no sooner than `intervalMs` after
 * the previous permitted call; concurrent callers are admitted one at a time.
 */
export class RateLimiter {
  private lastPermittedAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly intervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Spreads an aggregate ceiling across invocations expected to run at once, so that
   * each one self-limits to `requestsPerSecond / expectedConcurrency`.
   */
  static fromCeiling(requestsPerSecond: number, expectedConcurrency: number, clock?: Clock): RateLimiter {
    const interval = requestsPerSecond > 0 ? Math.ceil((1000 * Math.max(1, expectedConcurrency)) / requestsPerSecond) : 0;
    return new RateLimiter(interval, clock);
  }

  wait(): Promise<void> {
    const turn = this.tail.then(() => this.acquire());
    this.tail = turn.then(noop, noop);
    return turn;
  }

  private async acquire(): Promise<void> {
    if (this.intervalMs > 0 && this.lastPermittedAt !== null) {
      const waitMs = this.intervalMs - (this.clock.now() - this.lastPermittedAt);
      if (waitMs > 0) {
        await this.clock.sleep(waitMs);
      }
    }

    this.lastPermittedAt = this.clock.now();
  }
}
