import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

/**
 * General API rate limiter, per client IP. In-memory store (resets on restart).
 */
export function createApiRateLimiter(
  options: RateLimitOptions = { windowMs: 60 * 1000, max: 60 }
): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for the login endpoint. Lockout policy beyond this
 * lives outside the authenticator.
 */
export function createLoginRateLimiter(
  options: RateLimitOptions = { windowMs: 60 * 1000, max: 10 }
): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
