import { describe, expect, it, vi } from "vitest";
import { TimedCache, cachedValue } from "../server/data/timed-cache";

const makeClock = (start = 1000) => {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
};

describe("timed cache", () => {
  it("serves a fresh value without refetching inside the TTL", async () => {
    const clock = makeClock();
    const fetch = vi.fn(async () => "sunny");
    const cache = new TimedCache({ name: "test", ttlMs: 5000, fetch, now: clock.now });

    await expect(cache.get()).resolves.toEqual({ status: "fresh", value: "sunny", lastUpdated: 1000 });
    clock.advance(4999);
    await expect(cache.get()).resolves.toEqual({ status: "fresh", value: "sunny", lastUpdated: 1000 });
    expect(fetch).toHaveBeenCalledTimes(1);

    clock.advance(1);
    await cache.get();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("keeps value and timestamp together when a later step fails", async () => {
    const clock = makeClock();
    let round = 0;
    const steps: string[] = [];
    const cache = new TimedCache({
      name: "two-step",
      ttlMs: 1000,
      now: clock.now,
      fetch: async () => {
        round += 1;
        steps.push(`current-${round}`);
        if (round === 2) throw new Error("forecast timed out");
        steps.push(`forecast-${round}`);
        return { current: round, forecast: round };
      },
    });

    await cache.get();
    const before = cache.peek();
    clock.advance(2000);

    await expect(cache.get()).resolves.toEqual({
      status: "stale",
      value: { current: 1, forecast: 1 },
      lastUpdated: 1000,
      error: "forecast timed out",
    });
    expect(cache.peek()).toBe(before);
    expect(steps).toEqual(["current-1", "forecast-1", "current-2"]);
  });

  it("reports unavailable when nothing was ever fetched", async () => {
    const cache = new TimedCache<number>({
      name: "empty",
      ttlMs: 1000,
      fetch: async () => {
        throw new Error("offline");
      },
    });
    const read = await cache.get();
    expect(read).toEqual({ status: "unavailable", error: "offline" });
    expect(cachedValue(read)).toBeNull();
  });

  it("shares one in-flight fetch between concurrent readers", async () => {
    let release: (value: string) => void = () => undefined;
    const fetch = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
    );
    const cache = new TimedCache({ name: "dedupe", ttlMs: 1000, fetch, now: () => 0 });

    const first = cache.get();
    const second = cache.get();
    release("ready");
    const [a, b] = await Promise.all([first, second]);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(cachedValue(a)).toBe("ready");
    expect(cachedValue(b)).toBe("ready");
  });

  it("waits out the failure backoff before retrying", async () => {
    const clock = makeClock();
    const fetch = vi.fn(async (): Promise<string> => {
      throw new Error("503");
    });
    const cache = new TimedCache({ name: "backoff", ttlMs: 1000, failureBackoffMs: 5000, fetch, now: clock.now });

    await cache.get();
    clock.advance(4999);
    await expect(cache.get()).resolves.toEqual({ status: "unavailable", error: "503" });
    expect(fetch).toHaveBeenCalledTimes(1);

    clock.advance(1);
    await cache.get();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("reads without waiting and refreshes in the background", async () => {
    const clock = makeClock();
    let release: (value: string) => void = () => {};
    const fetch = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
    );
    const onUpdate = vi.fn();
    const cache = new TimedCache({ name: "read", ttlMs: 5000, fetch, onUpdate, now: clock.now });

    expect(cache.read()).toEqual({ status: "unavailable", error: null });
    expect(cache.read()).toEqual({ status: "unavailable", error: null });
    expect(fetch).toHaveBeenCalledTimes(1);

    release("clear");
    await vi.waitFor(() => expect(onUpdate).toHaveBeenCalledTimes(1));
    expect(cache.read()).toEqual({ status: "fresh", value: "clear", lastUpdated: 1000 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("serves the stale value while an expired entry refreshes", async () => {
    const clock = makeClock();
    let n = 0;
    const cache = new TimedCache({ name: "stale-read", ttlMs: 1000, now: clock.now, fetch: async () => ++n });
    await cache.get();
    clock.advance(1000);
    expect(cache.read()).toEqual({ status: "stale", value: 1, lastUpdated: 1000, error: null });
    await vi.waitFor(() => expect(cache.peek()).toBe(2));
  });
});
