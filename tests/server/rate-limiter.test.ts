import { describe, it, expect } from "vitest";
import { RateLimiter } from "../../src/server/rate-limiter.js";

describe("RateLimiter", () => {
  function clock(start = 1_000_000) {
    const state = { now: start };
    return { state, now: () => state.now };
  }

  it("allows up to the limit within a window", () => {
    const { now } = clock();
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 60_000 }, now);

    expect(limiter.consume("10.0.0.1")).toEqual({
      allowed: true,
      limit: 2,
      remaining: 1,
      resetAt: 1_060_000,
      retryAfterSeconds: 0,
    });
    expect(limiter.consume("10.0.0.1").remaining).toBe(0);
    expect(limiter.consume("10.0.0.1")).toEqual({
      allowed: false,
      limit: 2,
      remaining: 0,
      resetAt: 1_060_000,
      retryAfterSeconds: 60,
    });
  });

  it("keeps a window per client", () => {
    const { now } = clock();
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000 }, now);

    expect(limiter.consume("10.0.0.1").allowed).toBe(true);
    expect(limiter.consume("10.0.0.1").allowed).toBe(false);
    expect(limiter.consume("10.0.0.2").allowed).toBe(true);
  });

  it("rounds the retry hint up and opens a new window after reset", () => {
    const { state, now } = clock();
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000 }, now);
    limiter.consume("10.0.0.1");

    state.now += 58_500;
    expect(limiter.consume("10.0.0.1").retryAfterSeconds).toBe(2);

    state.now += 1_500;
    expect(limiter.consume("10.0.0.1")).toMatchObject({ allowed: true, resetAt: 1_120_000 });
  });

  it("drops expired windows", () => {
    const { state, now } = clock();
    const limiter = new RateLimiter({ maxRequests: 5, windowMs: 1_000 }, now);
    limiter.consume("a");
    limiter.consume("b");
    expect(limiter.size).toBe(2);

    state.now += 1_000;
    limiter.consume("c");

    expect(limiter.size).toBe(1);
  });

  it("allows everything when disabled", () => {
    const { now } = clock();
    const limiter = new RateLimiter({ maxRequests: 0, windowMs: 60_000 }, now);

    expect(limiter.enabled).toBe(false);
    expect(limiter.consume("a").allowed).toBe(true);
    expect(limiter.consume("a").allowed).toBe(true);
  });
});
