import { Request, Response, NextFunction } from "express";
import { RateLimitCounter } from "../../application/ports/services";
import { logError } from "../../infrastructure/logging/logger";

/**
 * Fixed-window rate limiter middleware.
 * Limits requests per caller (by extractId) or by IP if none is given.
 */
export function rateLimiter(options: {
  counter: RateLimitCounter;
  windowMs: number;
  maxRequests: number;
  keyPrefix: string;
  extractId?: (req: Request) => string | null;
}) {
  const { counter, windowMs, maxRequests, keyPrefix, extractId } = options;
  const windowSec = Math.ceil(windowMs / 1000);

  return async (req: Request, res: Response, next: NextFunction) => {
    const id = extractId ? extractId(req) : req.ip ?? "unknown";
    if (!id) {
      return next();
    }

    let current: number;
    try {
      current = await counter.hit(`${keyPrefix}:${id}`, windowSec);
    } catch (error) {
      // Fail open: the counter store being down must not lock admins out.
      logError("rate_limit.unavailable", error, { keyPrefix });
      return next();
    }

    res.setHeader("X-RateLimit-Limit", maxRequests);
    res.setHeader("X-RateLimit-Remaining", Math.max(0, maxRequests - current));

    if (current > maxRequests) {
      return res.status(429).json({
        error: "RATE_LIMITED",
        message: `Too many requests. Limit: ${maxRequests} per ${windowSec}s window.`
      });
    }

    return next();
  };
}
