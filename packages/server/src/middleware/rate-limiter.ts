import type { MiddlewareHandler } from 'hono';
import type { BridgeEnv } from '../types/hono.js';
import { BridgeError } from '../errors/bridge-error.js';

export interface RateLimiterOptions {
  windowMs: number;
  maxRequests: number;
  clock?: () => number;
}

interface Window {
  used: number;
  resetAt: number;
}

const ANONYMOUS_CALLER = 'anonymous';

/**
 * Fixed-window request budget per API key
 *
 * Runs after `apiKeyAuth`, which records the caller's key fingerprint. When
 * the bridge has no API key configured every caller shares one budget.
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<BridgeEnv> {
  const { windowMs, maxRequests, clock = Date.now } = options;
  const windows = new Map<string, Window>();

  const windowFor = (caller: string, now: number): Window => {
    for (const [key, window] of windows) {
      if (window.resetAt <= now) windows.delete(key);
    }
    let window = windows.get(caller);
    if (!window) {
      window = { used: 0, resetAt: now + windowMs };
      windows.set(caller, window);
    }
    return window;
  };

  return async (c, next) => {
    const now = clock();
    const window = windowFor(c.get('caller') ?? ANONYMOUS_CALLER, now);
    const allowed = window.used < maxRequests;
    if (allowed) window.used++;

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(maxRequests - window.used));
    c.header('X-RateLimit-Reset', String(Math.ceil(window.resetAt / 1000)));

    if (!allowed) {
      const retryAfter = Math.ceil((window.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      throw BridgeError.rateLimited(`Rate limit exceeded. Try again in ${retryAfter} seconds.`);
    }

    await next();
  };
}
