import type { RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';
import type { RateLimitConfig } from '../config';

/**
 * General API rate limiter, per IP. `max: 0` turns limiting off.
 */
export function createApiLimiter(config: RateLimitConfig): RequestHandler {
  if (config.max === 0) {
    return (req, res, next) => next();
  }

  return rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
      res.status(429).json({
        code: 'rate_limit_exceeded',
        message: 'Too many requests, please try again later.',
      });
    },
  });
}
