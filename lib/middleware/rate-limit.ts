/**
 * Fixed-window rate limiting kept in process memory. One counter per
 * limiter name and client key; the login route is the only caller today.
 */

import { NextRequest, NextResponse } from "next/server";
import { env } from "@/lib/config/env";
import { rateLimit as rateLimitResponse } from "@/lib/utils/api-response";
import { logger } from "@/lib/utils/logger";

export interface RateLimitConfig {
  /** Separates the counters of different limiters */
  name: string;
  max: number;
  windowMs: number;
  /** Defaults to the client IP */
  keyGenerator?: (request: NextRequest) => string;
  message?: string;
}

interface Window {
  count: number;
  resetAt: number;
}

const CLEANUP_INTERVAL_MS = 60_000;

const windows = new Map<string, Window>();

function hit(key: string, windowMs: number): Window {
  const now = Date.now();
  const current = windows.get(key);
  if (current && now < current.resetAt) {
    current.count++;
    return current;
  }

  const fresh = { count: 1, resetAt: now + windowMs };
  windows.set(key, fresh);
  return fresh;
}

function sweep(): void {
  const now = Date.now();
  let removed = 0;
  for (const [key, window] of windows) {
    if (now >= window.resetAt) {
      windows.delete(key);
      removed++;
    }
  }
  if (removed > 0) {
    logger.debug("Rate limit windows expired", { removed, remaining: windows.size });
  }
}

setInterval(sweep, CLEANUP_INTERVAL_MS).unref();

/**
 * Resolves to a 429 response once the caller is over the limit, or null
 * when the request may proceed.
 */
export function createRateLimiter(config: RateLimitConfig) {
  const { name, max, windowMs, keyGenerator = clientIp } = config;
  const message = config.message ?? "Too many requests, please try again later";

  return async (request: NextRequest): Promise<NextResponse | null> => {
    const key = `${name}:${keyGenerator(request)}`;
    const window = hit(key, windowMs);
    if (window.count <= max) {
      return null;
    }

    logger.warn("Rate limit exceeded", { key, count: window.count, max, path: request.nextUrl.pathname });

    const response = rateLimitResponse(message, Math.ceil((window.resetAt - Date.now()) / 1000));
    response.headers.set("X-RateLimit-Limit", max.toString());
    response.headers.set("X-RateLimit-Remaining", "0");
    response.headers.set("X-RateLimit-Reset", new Date(window.resetAt).toISOString());
    return response;
  };
}

/** First X-Forwarded-For hop, then X-Real-IP */
export function clientIp(request: NextRequest): string {
  const forwarded = request.headers.get("x-forwarded-for");
  if (forwarded) {
    return forwarded.split(",")[0].trim();
  }
  return request.headers.get("x-real-ip") ?? "unknown";
}

export const loginRateLimit = createRateLimiter({
  name: "login",
  max: env.LOGIN_RATE_LIMIT_MAX,
  windowMs: 15 * 60 * 1000,
  message: "Too many authentication attempts, please try again later",
});

export function resetRateLimits(): void {
  windows.clear();
}
