import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

const WINDOW_MS = 60 * 1000;

/**
 * General API rate limiter, per client IP per minute.
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter(max: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    max,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter rate limiter for the login endpoints.
 */
export function createLoginRateLimiter(max: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    max,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many login attempts, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
    // Use IP address for login (no user ID available yet)
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
