import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { RequestPacer, sleep } from "../../src/api/rate-limiter.js";

describe("RequestPacer", () => {
  it("should not pause when the interval is zero", async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    const pacer = new RequestPacer(0, sleepFn);

    await pacer.pace();
    await pacer.pace();

    expect(pacer.enabled).toBe(false);
    expect(pacer.pauseCount).toBe(0);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("should pause for the interval on every call", async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    const pacer = new RequestPacer(150, sleepFn);

    await pacer.pace();
    await pacer.pace();

    expect(pacer.pauseCount).toBe(2);
    expect(sleepFn).toHaveBeenNthCalledWith(1, 150);
    expect(sleepFn).toHaveBeenNthCalledWith(2, 150);
  });

  it("should treat a negative interval as disabled", () => {
    expect(new RequestPacer(-5).enabled).toBe(false);
  });
});

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve after the given delay", async () => {
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });
});
