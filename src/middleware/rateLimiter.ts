import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

export interface RateLimitOptions {
  windowMs: number;
  limit: number;
}

// Several clients reporting every few seconds share one address in tests and demos
export const DEFAULT_RATE_LIMIT: RateLimitOptions = {
  windowMs: 60_000,
  limit: 600,
};

export const STRICT_RATE_LIMIT: RateLimitOptions = {
  windowMs: 60_000,
  limit: 60,
};

export function createLimiter(options: RateLimitOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: true,
    legacyHeaders: false,
    validate: { xForwardedForHeader: false },
  });
}
