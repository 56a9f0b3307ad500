// server/src/middlewares/rateLimit.ts
/** In-memory fixed-window limiter keyed by client IP. Per process; fine behind a single instance. */

import type { RequestHandler } from "express";

type Bucket = { count: number; resetAt: number };

export type RateLimitOptions = {
  windowMs?: number;
  max?: number;
  now?: () => number;
};

export type Hit = { limited: boolean; remaining: number; resetAt: number; retryAfterSec: number };

export function fixedWindow(opts: RateLimitOptions = {}) {
  const windowMs = opts.windowMs ?? 15_000;
  const max = opts.max ?? 100;
  const now = opts.now ?? Date.now;
  const buckets = new Map<string, Bucket>();

  return {
    max,
    hit(key: string): Hit {
      const t = now();
      let b = buckets.get(key);
      if (!b || b.resetAt <= t) {
        // drop stale buckets now and then so the map tracks only live windows
        if (buckets.size > 10_000) {
          for (const [k, v] of buckets) if (v.resetAt <= t) buckets.delete(k);
        }
        b = { count: 0, resetAt: t + windowMs };
        buckets.set(key, b);
      }
      b.count += 1;
      return {
        limited: b.count > max,
        remaining: Math.max(0, max - b.count),
        resetAt: b.resetAt,
        retryAfterSec: Math.max(1, Math.ceil((b.resetAt - t) / 1000)),
      };
    },
  };
}

export const rateLimit = (opts: RateLimitOptions = {}): RequestHandler => {
  const window = fixedWindow(opts);
  return (req, res, next) => {
    const hit = window.hit(req.ip || "unknown");
    res.setHeader("x-ratelimit-limit", String(window.max));
    res.setHeader("x-ratelimit-remaining", String(hit.remaining));
    res.setHeader("x-ratelimit-reset", String(Math.floor(hit.resetAt / 1000)));
    if (hit.limited) {
      res.setHeader("Retry-After", String(hit.retryAfterSec));
      return res
        .status(429)
        .json({ error: { code: "RATE_LIMITED", message: "Too many requests" } });
    }
    next();
  };
};
