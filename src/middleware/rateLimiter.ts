import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';

const baseOptions = {
  windowMs: 60_000,
  max: 60,
  standardHeaders: true,
  legacyHeaders: false,
};

export interface AdminLimiters {
  defaultLimiter: RateLimitRequestHandler;
  strictLimiter: RateLimitRequestHandler;
}

/**
 * Limiters are per app so two admin apps never share counters
 */
export function createLimiters(): AdminLimiters {
  return {
    defaultLimiter: rateLimit(baseOptions),
    strictLimiter: rateLimit({
      ...baseOptions,
      max: 10,
    }),
  };
}
