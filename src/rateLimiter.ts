import { delay } from "./utils";

/**
 * Promise-chained mutual exclusion. Each caller waits for the previous holder's
 * section to settle before its own runs.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(section: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting += 1;
    try {
      await previous;
      return await section();
    } finally {
      this.waiting -= 1;
      release();
    }
  }

  isLocked(): boolean {
    return this.waiting > 0;
  }
}

/**
 * Fixed-interval gate: admits at most one caller per `1 / maxRequestsPerSecond`
 * seconds across everyone sharing the instance. No burst allowance.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly mutex = new Mutex();
  private lastRequestTime = Number.NEGATIVE_INFINITY;
  private admitted = 0;

  constructor(
    readonly maxRequestsPerSecond: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = delay,
  ) {
    if (!(maxRequestsPerSecond > 0)) {
      throw new RangeError(
        `maxRequestsPerSecond must be positive, got ${maxRequestsPerSecond}`,
      );
    }
    this.minIntervalMs = 1000 / maxRequestsPerSecond;
  }

  async wait(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const elapsed = this.now() - this.lastRequestTime;
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
      }
      this.lastRequestTime = this.now();
      this.admitted += 1;
    });
  }

  getAdmittedCount(): number {
    return this.admitted;
  }
}
