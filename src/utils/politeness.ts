export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PolitenessOptions {
  baseDelayMs: number;
  jitterMs: number;
  backoffUnitMs: number;
  random?: () => number;
  sleep?: SleepFn;
}

/**
 * Randomized pauses between requests to the target site. All waiting in the
 * crawlers goes through this class so tests can replace the clock.
 */
export class PolitenessDelay {
  private readonly random: () => number;
  private readonly sleepFn: SleepFn;

  constructor(private readonly options: PolitenessOptions) {
    this.random = options.random ?? Math.random;
    this.sleepFn = options.sleep ?? sleep;
  }

  /** base + U(0, jitter) + U(0, extraJitter), in whole milliseconds. */
  nextInterval(extraJitterMs = 0): number {
    const jitter = this.random() * this.options.jitterMs;
    const extra = extraJitterMs > 0 ? this.random() * extraJitterMs : 0;
    return Math.round(this.options.baseDelayMs + jitter + extra);
  }

  backoffInterval(attempt: number): number {
    return Math.max(0, attempt) * this.options.backoffUnitMs;
  }

  async wait(extraJitterMs = 0): Promise<number> {
    const interval = this.nextInterval(extraJitterMs);
    await this.sleepFn(interval);
    return interval;
  }

  async backoff(attempt: number): Promise<number> {
    const interval = this.backoffInterval(attempt);
    await this.sleepFn(interval);
    return interval;
  }

  /** Fixed wait for client-side rendering to finish. */
  async settle(ms: number): Promise<void> {
    await this.sleepFn(ms);
  }
}
