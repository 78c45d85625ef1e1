import { describe, expect, it } from "vitest";
import { HostRateLimiter } from "../src/core/rateLimiter";

function fakeClock() {
  let current = 1_000;
  const waits: number[] = [];
  return {
    now: () => current,
    wait: async (ms: number) => {
      waits.push(ms);
    },
    advance: (ms: number) => {
      current += ms;
    },
    waits,
  };
}

describe("HostRateLimiter", () => {
  it("spaces back-to-back requests to one host", async () => {
    const clock = fakeClock();
    const limiter = new HostRateLimiter(100, clock.now, clock.wait);

    await limiter.acquire("https://a.test/1");
    await limiter.acquire("https://a.test/2");
    await limiter.acquire("https://a.test/3");

    expect(clock.waits).toEqual([100, 200]);
  });

  it("keeps hosts independent", async () => {
    const clock = fakeClock();
    const limiter = new HostRateLimiter(100, clock.now, clock.wait);

    await limiter.acquire("https://a.test/1");
    await limiter.acquire("https://b.test/1");

    expect(clock.waits).toEqual([]);
  });

  it("does not wait once the interval has passed", async () => {
    const clock = fakeClock();
    const limiter = new HostRateLimiter(100, clock.now, clock.wait);

    await limiter.acquire("https://a.test/1");
    clock.advance(150);
    await limiter.acquire("https://a.test/2");
    clock.advance(40);
    await limiter.acquire("https://a.test/3");

    expect(clock.waits).toEqual([60]);
  });

  it("is a no-op with a zero interval", async () => {
    const clock = fakeClock();
    const limiter = new HostRateLimiter(0, clock.now, clock.wait);

    await limiter.acquire("https://a.test/1");
    await limiter.acquire("https://a.test/2");

    expect(clock.waits).toEqual([]);
  });
});
