import type { Request, Response, NextFunction } from 'express';

type RateLimitOptions = {
  windowMs: number;
  max: number;
};

type RateLimitState = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window limiter keyed by client IP.
 * In-process only: it throttles abusive clients, it is not part of replay protection.
 */
export function createRateLimiter({ windowMs, max }: RateLimitOptions) {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const hits = new Map<string, RateLimitState>();

  return (req: Request, res: Response, next: NextFunction) => {
    const now = Date.now();
    const key = req.ip || 'unknown';
    let state = hits.get(key);

    if (!state || now >= state.resetAt) {
      // Drop expired windows so the map does not grow with one-off clients
      for (const [k, v] of hits) {
        if (now >= v.resetAt) hits.delete(k);
      }
      state = { count: 0, resetAt: now + windowMs };
      hits.set(key, state);
    }

    state.count += 1;
    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - state.count)));
    res.setHeader('X-RateLimit-Reset', String(state.resetAt));

    if (state.count > max) {
      res.setHeader('Retry-After', String(Math.ceil((state.resetAt - now) / 1000)));
      return res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many requests. Please retry later.',
      });
    }

    next();
  };
}
