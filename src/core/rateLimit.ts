import { ThrottleConfig } from "../config";

export type SleepFn = (ms: number) => Promise<void>;

export interface RateLimitPolicy {
  schedule<T>(task: () => Promise<T>): Promise<T>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface JitterDelayOptions {
  minWaitMs: number;
  randomWaitMs: number;
  sleepFn?: SleepFn;
  random?: () => number;
}

/**
 * Runs the request first, then holds the caller for `minWaitMs` plus a uniform share of
 * `randomWaitMs` before handing back the result or the failure, whatever the server did.
 */
export class JitterDelayPolicy implements RateLimitPolicy {
  private readonly minWaitMs: number;
  private readonly randomWaitMs: number;
  private readonly sleepFn: SleepFn;
  private readonly random: () => number;

  constructor(options: JitterDelayOptions) {
    this.minWaitMs = Math.max(0, options.minWaitMs);
    this.randomWaitMs = Math.max(0, options.randomWaitMs);
    this.sleepFn = options.sleepFn ?? sleep;
    this.random = options.random ?? Math.random;
  }

  nextDelayMs(): number {
    return this.minWaitMs + this.random() * this.randomWaitMs;
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } finally {
      await this.sleepFn(this.nextDelayMs());
    }
  }
}

export interface FixedIntervalOptions {
  intervalMs: number;
  sleepFn?: SleepFn;
  now?: () => number;
}

/** Spaces request starts at least `intervalMs` apart. */
export class FixedIntervalPolicy implements RateLimitPolicy {
  private readonly intervalMs: number;
  private readonly sleepFn: SleepFn;
  private readonly now: () => number;
  private lastStartedAt?: number;

  constructor(options: FixedIntervalOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.sleepFn = options.sleepFn ?? sleep;
    this.now = options.now ?? Date.now;
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    if (this.lastStartedAt !== undefined) {
      const waitMs = this.intervalMs - (this.now() - this.lastStartedAt);
      if (waitMs > 0) {
        await this.sleepFn(waitMs);
      }
    }
    this.lastStartedAt = this.now();
    return task();
  }
}

export function createRateLimitPolicy(throttle: ThrottleConfig, sleepFn: SleepFn = sleep): RateLimitPolicy {
  switch (throttle.mode) {
    case "jitter":
      return new JitterDelayPolicy({ minWaitMs: throttle.minWaitMs, randomWaitMs: throttle.randomWaitMs, sleepFn });
    case "fixed_interval":
      return new FixedIntervalPolicy({ intervalMs: throttle.intervalMs, sleepFn });
    default: {
      const unsupported: never = throttle.mode;
      throw new Error(`Unsupported throttle mode: ${String(unsupported)}`);
    }
  }
}
