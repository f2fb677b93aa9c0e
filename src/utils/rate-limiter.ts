export interface RateLimiterOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onWait?: (waitMs: number) => void;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Serializes calls and keeps at least `minIntervalMs` between the start of
 * one call and the start of the next.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onWait?: (waitMs: number) => void;
  private tail: Promise<void> = Promise.resolve();
  private lastStart: number | null = null;

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = options.minIntervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.onWait = options.onWait;
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      if (this.lastStart !== null) {
        const waitMs = this.lastStart + this.minIntervalMs - this.now();
        if (waitMs > 0) {
          this.onWait?.(waitMs);
          await this.sleep(waitMs);
        }
      }
      this.lastStart = this.now();
      return await fn();
    } finally {
      release();
    }
  }
}
