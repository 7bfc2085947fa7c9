import { describe, it, expect, vi, afterEach } from "vitest";
import { RateLimiter } from "../net/rateLimiter";

describe("RateLimiter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("schedules tasks at the configured qps", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const limiter = new RateLimiter({ qps: 2, burst: 1, jitterRatio: 0 });
    const starts: number[] = [];

    const tasks = Array.from({ length: 3 }, () =>
      limiter.schedule(() => {
        starts.push(Date.now());
        return "ok";
      })
    );

    await vi.advanceTimersByTimeAsync(1200);
    await Promise.all(tasks);
    expect(starts[0]).toBe(0);
    expect(starts[1]).toBeGreaterThanOrEqual(500);
    expect(starts[1]).toBeLessThanOrEqual(505);
    expect(starts[2]).toBeGreaterThanOrEqual(1000);
    expect(starts[2]).toBeLessThanOrEqual(1005);
  });

  it("never runs more than maxConcurrent tasks at once", async () => {
    const limiter = new RateLimiter({ maxConcurrent: 2 });
    let running = 0;
    let peak = 0;
    const task = async (value: number) => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running -= 1;
      return value;
    };

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((value) => limiter.schedule(() => task(value)))
    );

    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it("drops queued tasks whose signal is aborted", async () => {
    const limiter = new RateLimiter({ maxConcurrent: 1 });
    const controller = new AbortController();
    const ran: string[] = [];
    let release: () => void = () => {};
    const blocker = limiter.schedule(
      () =>
        new Promise<void>((resolve) => {
          ran.push("blocker");
          release = resolve;
        })
    );
    const queued = limiter.schedule(() => {
      ran.push("queued");
    }, controller.signal);

    await vi.waitFor(() => expect(ran).toEqual(["blocker"]));
    controller.abort();
    release();

    await expect(queued).rejects.toMatchObject({ name: "AbortError" });
    await blocker;
    expect(ran).toEqual(["blocker"]);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const limiter = new RateLimiter();
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(() => 1);

    await expect(limiter.schedule(fn, controller.signal)).rejects.toMatchObject({
      name: "AbortError"
    });
    expect(fn).not.toHaveBeenCalled();
  });

  it("passes task errors through", async () => {
    const limiter = new RateLimiter();
    await expect(
      limiter.schedule(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(limiter.schedule(() => "next")).resolves.toBe("next");
  });
});
