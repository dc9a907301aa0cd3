import { describe, expect, it } from "vitest";
import { backoffBase, backoffDelay, BackoffPolicy, sleep } from "../backoff.js";

const policy: BackoffPolicy = { floorMs: 1000, ceilingMs: 60_000, jitterRatio: 0.2 };

describe("backoffBase", () => {
  it("doubles from the floor up to the ceiling", () => {
    const bases = [1, 2, 3, 4, 5, 6, 7, 8].map((n) => backoffBase(n, policy));
    expect(bases).toEqual([1000, 2000, 4000, 8000, 16_000, 32_000, 60_000, 60_000]);
  });

  it("stays at the ceiling for long failure streaks", () => {
    expect(backoffBase(500, policy)).toBe(60_000);
    expect(backoffBase(0, policy)).toBe(1000);
  });
});

describe("backoffDelay", () => {
  it("spreads the delay around the base", () => {
    expect(backoffDelay(2, policy, () => 0)).toBe(1600);
    expect(backoffDelay(2, policy, () => 0.5)).toBe(2000);
    expect(backoffDelay(2, policy, () => 1)).toBe(2400);
  });

  it("never exceeds the ceiling", () => {
    expect(backoffDelay(10, policy, () => 1)).toBe(60_000);
    expect(backoffDelay(10, policy, () => 0)).toBe(48_000);
  });
});

describe("sleep", () => {
  it("resolves true once the time has passed", async () => {
    await expect(sleep(5)).resolves.toBe(true);
  });

  it("resolves false as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(false);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("does not wait at all on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal)).resolves.toBe(false);
  });
});
