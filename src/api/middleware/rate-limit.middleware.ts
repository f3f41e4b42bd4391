import type { Request, Response, NextFunction } from 'express';
import {
  rateLimiterService,
  type RateLimiterService,
} from '../../services/auth/rate-limiter.service';
import { ErrorCodes, HttpStatus } from '../../utils/error-codes';
import { env } from '../../config/environment';

interface RateLimitConfig {
  name: string;
  windowMs: number;
  maxRequests: number;
  keyGenerator?: (req: Request) => string;
  limiter?: RateLimiterService;
}

/**
 * Create rate limit middleware; each config keeps its own key space
 */
export function createRateLimitMiddleware(config: RateLimitConfig) {
  const limiter = config.limiter ?? rateLimiterService;

  return (req: Request, res: Response, next: NextFunction): void => {
    const client = config.keyGenerator
      ? config.keyGenerator(req)
      : req.ip || req.socket.remoteAddress || 'unknown';

    const decision = limiter.consume(`${config.name}:${client}`, config.maxRequests, config.windowMs);
    const resetInSeconds = Math.ceil(decision.resetInMs / 1000);

    res.setHeader('X-RateLimit-Limit', config.maxRequests);
    res.setHeader('X-RateLimit-Remaining', decision.remaining);
    res.setHeader('X-RateLimit-Reset', resetInSeconds);

    if (!decision.allowed) {
      res.status(HttpStatus.TOO_MANY_REQUESTS).json({
        success: false,
        error: 'Too many requests, please try again later',
        code: ErrorCodes.RATE_LIMIT_EXCEEDED,
        details: { retryAfter: resetInSeconds },
      });
      return;
    }

    next();
  };
}

/**
 * General API limiter (100 requests per 15 minutes by default)
 */
export const adminRateLimiter = createRateLimitMiddleware({
  name: 'api',
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
});

/**
 * Credential endpoints: login, forgot-password, reset-password (5 per 15 minutes by default)
 */
export const loginRateLimiter = createRateLimitMiddleware({
  name: 'credentials',
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  maxRequests: env.LOGIN_RATE_LIMIT_MAX,
});
