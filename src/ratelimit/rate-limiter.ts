/**
 * Per-monitor check-in rate limiter
 *
 * Fixed window per (environment, slug): a counter and the instant the window
 * opened, checked and incremented in one synchronous step. Rejected check-ins
 * are dropped by the caller, never queued.
 */

export interface RateLimiterConfig {
  max: number;
  windowMs: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

interface Window {
  startedAt: number;
  count: number;
}

const DEFAULT_RATE_LIMIT: RateLimiterConfig = { max: 6, windowMs: 60_000 };

// Expired windows are swept once the map grows past this
const EVICTION_THRESHOLD = 10_000;

export function createRateLimiter(overrides: Partial<RateLimiterConfig> = {}) {
  const config: RateLimiterConfig = { ...DEFAULT_RATE_LIMIT, ...overrides };
  const windows = new Map<string, Window>();

  function evictExpired(now: number): void {
    for (const [key, window] of windows) {
      if (now - window.startedAt >= config.windowMs) {
        windows.delete(key);
      }
    }
  }

  return {
    tryAcquire(key: string, now: Date = new Date()): RateLimitDecision {
      const t = now.getTime();
      const window = windows.get(key);

      if (!window || t - window.startedAt >= config.windowMs) {
        if (windows.size >= EVICTION_THRESHOLD) evictExpired(t);
        windows.set(key, { startedAt: t, count: 1 });
        return { allowed: true, remaining: config.max - 1, retryAfterMs: 0 };
      }

      if (window.count < config.max) {
        window.count++;
        return { allowed: true, remaining: config.max - window.count, retryAfterMs: 0 };
      }

      return {
        allowed: false,
        remaining: 0,
        retryAfterMs: window.startedAt + config.windowMs - t,
      };
    },

    reset(): void {
      windows.clear();
    },

    size(): number {
      return windows.size;
    },
  };
}

export type RateLimiter = ReturnType<typeof createRateLimiter>;
