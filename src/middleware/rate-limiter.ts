import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response } from 'express';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('rate-limiter');

const getClientIp = (req: Request): string => {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    return forwarded.split(',')[0].trim();
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
};

function createLimiter(windowMinutes: number, max: number, error: string, message: string): RateLimitRequestHandler {
  return rateLimit({
    windowMs: windowMinutes * 60 * 1000,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: getClientIp,
    handler: (req: Request, res: Response) => {
      logger.warn({ ip: getClientIp(req), path: req.path }, error);
      res.status(429).json({ error, message, retryAfter: windowMinutes * 60 });
    }
  });
}

export const globalRateLimiter = createLimiter(15, 100, 'Too many requests', 'Please try again later');

// Each manual run spends generation and upload quota.
export const runRateLimiter = createLimiter(60, 10, 'Too many run requests', 'Manual runs are limited to 10 per hour');

export const authRateLimiter = createLimiter(15, 5, 'Too many login attempts', 'Please try again in 15 minutes');
