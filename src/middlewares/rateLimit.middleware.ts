import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  message?: string;
  now?: () => number;
}

/**
 * Fixed-window limiter keyed by path and client IP. Each limiter owns its
 * store; expired entries are dropped as requests arrive.
 */
export const rateLimit = ({ windowMs, maxRequests, message, now = Date.now }: RateLimitOptions) => {
  const store = new Map<string, RateLimitEntry>();

  const evictExpired = (at: number) => {
    for (const [key, entry] of store) {
      if (entry.resetTime <= at) {
        store.delete(key);
      }
    }
  };

  return (req: Request, res: Response, next: NextFunction) => {
    const at = now();
    const clientId = req.ip || 'unknown';
    const key = `${req.path}:${clientId}`;

    evictExpired(at);

    let entry = store.get(key);
    if (!entry) {
      entry = { count: 0, resetTime: at + windowMs };
      store.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - at) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.path,
        count: entry.count,
        limit: maxRequests,
      });

      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};

// 10 login attempts per 15 minutes
export const createLoginLimiter = () =>
  rateLimit({
    windowMs: 15 * 60 * 1000,
    maxRequests: 10,
    message: 'Too many login attempts. Try again in 15 minutes.',
  });
