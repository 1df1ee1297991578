import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { RateLimitConfig } from "../config";

export interface RateLimitWindow {
  count: number;
  resetAt: number;
}

export interface RateLimitStore {
  increment(key: string, windowMs: number, nowMs: number): RateLimitWindow;
}

const WINDOW_MS = 60_000;
const MIN_TRACKED_CLIENTS = 100;
const DEFAULT_TRACKED_CLIENTS = 5_000;
const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

/** Fixed windows keyed by bucket. Expired windows are dropped first when the store is full, then the oldest. */
export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, RateLimitWindow>();
  private readonly capacity: number;

  constructor(capacity = DEFAULT_TRACKED_CLIENTS) {
    this.capacity = Math.max(MIN_TRACKED_CLIENTS, capacity);
  }

  increment(key: string, windowMs: number, nowMs: number): RateLimitWindow {
    const current = this.windows.get(key);
    if (current && current.resetAt > nowMs) {
      const next = { count: current.count + 1, resetAt: current.resetAt };
      this.windows.set(key, next);
      return next;
    }

    if (!current && this.windows.size >= this.capacity) {
      this.evict(nowMs);
    }

    const fresh = { count: 1, resetAt: nowMs + windowMs };
    this.windows.set(key, fresh);
    return fresh;
  }

  private evict(nowMs: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= nowMs) {
        this.windows.delete(key);
      }
    }

    for (const key of this.windows.keys()) {
      if (this.windows.size < this.capacity) {
        return;
      }
      this.windows.delete(key);
    }
  }
}

export function resolveClientIdentity(req: Request): string {
  return `ip:${req.ips[0] ?? req.ip ?? "unknown"}`;
}

export interface RateLimitOptions {
  store: RateLimitStore;
  keyPrefix: string;
  now?: () => number;
}

function sendLimitHeaders(res: Response, limit: number, window: RateLimitWindow, nowMs: number): number {
  const resetSeconds = Math.max(1, Math.ceil((window.resetAt - nowMs) / 1000));
  res.setHeader("RateLimit-Limit", String(limit));
  res.setHeader("RateLimit-Remaining", String(Math.max(0, limit - window.count)));
  res.setHeader("RateLimit-Reset", String(resetSeconds));
  return resetSeconds;
}

/**
 * Reads (`GET`, `HEAD`, `OPTIONS`) and writes count against separate per-client
 * buckets, limited by `readPerMinute` and `writePerMinute`.
 */
export function createRateLimitMiddleware(config: RateLimitConfig, options: RateLimitOptions): RequestHandler {
  const now = options.now ?? Date.now;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!config.enabled) {
      next();
      return;
    }

    const isRead = READ_METHODS.has(req.method);
    const limit = isRead ? config.readPerMinute : config.writePerMinute;
    const bucket = `${options.keyPrefix}-${isRead ? "read" : "write"}:${resolveClientIdentity(req)}`;
    const nowMs = now();
    const window = options.store.increment(bucket, WINDOW_MS, nowMs);
    const resetSeconds = sendLimitHeaders(res, limit, window, nowMs);

    if (window.count > limit) {
      res.setHeader("Retry-After", String(resetSeconds));
      res.status(429).json({ error: "Too many requests" });
      return;
    }

    next();
  };
}
