import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { computeBackoffDelay, createDelay } from "../src/backoff.ts";

const options = { baseDelayMs: 1000, maxDelayMs: 30_000 };

describe("computeBackoffDelay", () => {
  it("should double the delay per attempt", () => {
    const delays = [1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt, options, () => 1));

    expect(delays).toEqual([1000, 2000, 4000, 8000]);
  });

  it("should cap the delay", () => {
    expect(computeBackoffDelay(10, options, () => 1)).toBe(30_000);
  });

  it("should randomize half of the delay by default", () => {
    expect(computeBackoffDelay(1, options, () => 0)).toBe(500);
    expect(computeBackoffDelay(1, options, () => 0.5)).toBe(750);
  });

  it("should not jitter when jitter is 0", () => {
    expect(computeBackoffDelay(2, { ...options, jitter: 0 }, () => 0)).toBe(2000);
  });
});

describe("createDelay", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve true once the time has passed", async () => {
    const delay = createDelay(1000);

    await vi.advanceTimersByTimeAsync(1000);

    await expect(delay.done).resolves.toBe(true);
  });

  it("should resolve false when cancelled", async () => {
    const delay = createDelay(1000);

    delay.cancel();

    await expect(delay.done).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});
