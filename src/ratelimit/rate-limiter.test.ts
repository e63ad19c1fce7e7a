import { describe, expect, test } from "vitest";
import { createRateLimiter } from "./rate-limiter";

const t0 = new Date("2026-03-10T12:00:00.000Z");
const after = (ms: number) => new Date(t0.getTime() + ms);

describe("createRateLimiter", () => {
  test("allows six check-ins per minute and rejects the seventh", () => {
    const limiter = createRateLimiter();
    for (let i = 0; i < 6; i++) {
      expect(limiter.tryAcquire("production/nightly-report", after(i * 1000)).allowed).toBe(true);
    }

    const seventh = limiter.tryAcquire("production/nightly-report", after(6000));
    expect(seventh).toEqual({ allowed: false, remaining: 0, retryAfterMs: 54_000 });
  });

  test("reports the remaining quota", () => {
    const limiter = createRateLimiter({ max: 3 });
    expect(limiter.tryAcquire("a", t0).remaining).toBe(2);
    expect(limiter.tryAcquire("a", t0).remaining).toBe(1);
    expect(limiter.tryAcquire("a", t0).remaining).toBe(0);
  });

  test("opens a fresh window after the window elapses", () => {
    const limiter = createRateLimiter({ max: 1, windowMs: 60_000 });
    expect(limiter.tryAcquire("a", t0).allowed).toBe(true);
    expect(limiter.tryAcquire("a", after(59_999)).allowed).toBe(false);
    expect(limiter.tryAcquire("a", after(60_000)).allowed).toBe(true);
  });

  test("keys are independent", () => {
    const limiter = createRateLimiter({ max: 1 });
    expect(limiter.tryAcquire("production/a", t0).allowed).toBe(true);
    expect(limiter.tryAcquire("staging/a", t0).allowed).toBe(true);
    expect(limiter.tryAcquire("production/a", t0).allowed).toBe(false);
  });

  test("reset clears every window", () => {
    const limiter = createRateLimiter({ max: 1 });
    limiter.tryAcquire("a", t0);
    limiter.reset();
    expect(limiter.size()).toBe(0);
    expect(limiter.tryAcquire("a", t0).allowed).toBe(true);
  });
});
