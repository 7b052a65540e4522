// src/middleware/rateLimiter.ts
import type { Request, Response, NextFunction } from "express";

interface CounterWindow {
  hits: number;
  resetAt: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: number;
}

const SWEEP_INTERVAL_MS = 60_000;

/**
 * Fixed-window hit counter, per process. Expired windows are swept once a
 * minute on a timer that never holds the process open.
 */
export class RateLimiter {
  private readonly windows = new Map<string, CounterWindow>();

  constructor() {
    setInterval(() => this.sweep(Date.now()), SWEEP_INTERVAL_MS).unref();
  }

  private sweep(now: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt < now) this.windows.delete(key);
    }
  }

  /** Count one hit against `key`; the hit that goes past `maxRequests` is refused. */
  check(key: string, windowMs: number, maxRequests: number, now: number = Date.now()): RateLimitResult {
    let window = this.windows.get(key);
    if (!window || window.resetAt < now) {
      window = { hits: 0, resetAt: now + windowMs };
      this.windows.set(key, window);
    }

    if (window.hits >= maxRequests) {
      return { allowed: false, remaining: 0, resetAt: window.resetAt };
    }
    window.hits += 1;
    return { allowed: true, remaining: maxRequests - window.hits, resetAt: window.resetAt };
  }
}

export interface RateLimitOptions {
  windowMs: number;       // Time window in milliseconds
  maxRequests: number;    // Max requests per window
  limiter?: RateLimiter;  // Shared counter store; a fresh one by default
  keyGenerator?: (req: Request) => string;
  message?: string;
}

function clientIp(req: Request): string {
  // Use X-Forwarded-For for proxied requests, fallback to IP
  const forwarded = req.headers["x-forwarded-for"];
  const ip = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(",")[0]?.trim();
  return ip || req.ip || req.socket.remoteAddress || "unknown";
}

/**
 * Rate limiting middleware.
 * Limits requests per client IP and route path by default.
 */
export function rateLimitMiddleware(options: RateLimitOptions) {
  const {
    windowMs,
    maxRequests,
    limiter = new RateLimiter(),
    keyGenerator = (req) => `${clientIp(req)}:${req.baseUrl}${req.path}`,
    message = "Too many requests, please try again later",
  } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const result = limiter.check(keyGenerator(req), windowMs, maxRequests);

    res.setHeader("X-RateLimit-Limit", maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(result.resetAt / 1000));

    if (!result.allowed) {
      const retryAfter = Math.ceil((result.resetAt - Date.now()) / 1000);
      console.warn(`[rate-limit] ${req.method} ${req.originalUrl} blocked for ${keyGenerator(req)}`);
      res.setHeader("Retry-After", retryAfter);
      return res.status(429).json({
        ok: false,
        error: message,
        retryAfter,
      });
    }

    next();
  };
}

export default rateLimitMiddleware;
