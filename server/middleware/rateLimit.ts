/**
 * Rate limiting middleware for API endpoints
 */

import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for conversion submissions, per IP
 */
export function createConvertRateLimit(maxPerMinute: number) {
  return rateLimit({
    windowMs: 60_000, // 1 minute
    max: maxPerMinute,
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    message: { error: 'Too many conversion requests. Please slow down.', code: 'RATE_LIMITED' },
  });
}

/**
 * Global rate limiter
 * 300 requests per minute per IP (fallback for all routes)
 */
export const globalRateLimit = rateLimit({
  windowMs: 60_000, // 1 minute
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: 'Too many requests. Please slow down.', code: 'RATE_LIMITED' },
});
