// src/utils/throttle.ts

export type Sleeper = (ms: number) => Promise<void>;

export interface DelayRange {
  minDelayMs: number;
  maxDelayMs: number;
}

export const defaultSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Fixed random pause between consecutive requests to one source.
 *
 * Delays are uniform in [minDelayMs, maxDelayMs]. There is no backoff and no
 * shared state: each scrape invocation owns its throttle.
 */
export class Throttle {
  constructor(
    private range: DelayRange,
    private sleep: Sleeper = defaultSleep,
    private random: () => number = Math.random
  ) {}

  nextDelayMs(): number {
    const { minDelayMs, maxDelayMs } = this.range;
    return minDelayMs + this.random() * (maxDelayMs - minDelayMs);
  }

  /**
   * Sleep for one random delay and return how long it was
   */
  async pause(): Promise<number> {
    const delay = this.nextDelayMs();
    await this.sleep(delay);
    return delay;
  }
}
