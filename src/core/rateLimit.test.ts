import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { createRateLimitPolicy, FixedIntervalPolicy, JitterDelayPolicy } from "./rateLimit";

describe("JitterDelayPolicy", () => {
  it("waits the minimum plus a random share after the task", async () => {
    const events: string[] = [];
    const policy = new JitterDelayPolicy({
      minWaitMs: 3_000,
      randomWaitMs: 10_000,
      random: () => 0.25,
      sleepFn: async (ms) => {
        events.push(`sleep:${ms}`);
      },
    });

    const result = await policy.schedule(async () => {
      events.push("task");
      return "body";
    });

    expect(result).toBe("body");
    expect(events).toEqual(["task", "sleep:5500"]);
  });

  it("still waits when the task fails", async () => {
    const sleeps: number[] = [];
    const policy = new JitterDelayPolicy({
      minWaitMs: 3_000,
      randomWaitMs: 0,
      sleepFn: async (ms) => {
        sleeps.push(ms);
      },
    });

    await expect(policy.schedule(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(sleeps).toEqual([3_000]);
  });
});

describe("FixedIntervalPolicy", () => {
  it("spaces task starts by the interval", async () => {
    let clock = 1_000;
    const sleeps: number[] = [];
    const policy = new FixedIntervalPolicy({
      intervalMs: 5_000,
      now: () => clock,
      sleepFn: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
    });
    const task = async (): Promise<number> => clock;

    expect(await policy.schedule(task)).toBe(1_000);
    clock = 2_000;
    expect(await policy.schedule(task)).toBe(6_000);
    clock = 12_000;
    expect(await policy.schedule(task)).toBe(12_000);
    expect(sleeps).toEqual([4_000]);
  });
});

describe("createRateLimitPolicy", () => {
  it("builds the policy named by the throttle mode", () => {
    expect(createRateLimitPolicy(DEFAULT_CONFIG.throttle)).toBeInstanceOf(JitterDelayPolicy);
    expect(createRateLimitPolicy({ ...DEFAULT_CONFIG.throttle, mode: "fixed_interval" })).toBeInstanceOf(FixedIntervalPolicy);
  });
});
