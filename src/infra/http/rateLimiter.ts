export type RateLimiterConfig = {
  minIntervalMs: number;
  maxConcurrent: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type RateLimitPermit = {
  release(): void;
};

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Gates outbound portal requests: at most `maxConcurrent` in flight, and
 * consecutive request starts at least `minIntervalMs` apart. Waiters are
 * served in arrival order; nothing is ever dropped.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly maxConcurrent: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly waiters: Array<() => void> = [];
  private active = 0;
  private nextStartAt = Number.NEGATIVE_INFINITY;

  constructor(config: RateLimiterConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new Error("maxConcurrent must be an integer >= 1");
    }

    if (config.minIntervalMs < 0) {
      throw new Error("minIntervalMs must be >= 0");
    }

    this.minIntervalMs = config.minIntervalMs;
    this.maxConcurrent = config.maxConcurrent;
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? defaultSleep;
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<RateLimitPermit> {
    await this.takeSlot();

    // Start times are reserved synchronously, so concurrent callers never share one.
    const currentTime = this.now();
    const startAt = Math.max(currentTime, this.nextStartAt);
    this.nextStartAt = startAt + this.minIntervalMs;

    const waitMs = startAt - currentTime;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }

    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }

        released = true;
        this.releaseSlot();
      },
    };
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    const permit = await this.acquire();
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  private takeSlot(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      // The slot passes straight to the next waiter; `active` stays unchanged.
      next();
      return;
    }

    this.active -= 1;
  }
}
