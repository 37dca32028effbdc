import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import { config } from '../../config/index.js';
import { sendError } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';

interface LimiterOptions {
  windowMs: number;
  limit: number;
  message: string;
  event: string;
}

/**
 * Per-client-IP limiter. `trust proxy` is set on the app, so `req.ip` is the
 * first forwarded address.
 */
function createLimiter(options: LimiterOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn(options.event, { ip: req.ip, path: req.path });
      sendError(res, options.message, 429, 'TOO_MANY_REQUESTS');
    },
  });
}

export const standardRateLimit = createLimiter({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: 'Too many requests, please try again later',
  event: 'API rate limit exceeded',
});

/**
 * The OAuth callback is unauthenticated, so it gets a much smaller budget.
 */
export const callbackRateLimit = createLimiter({
  windowMs: 15 * 60 * 1000,
  limit: 30,
  message: 'Too many authorization attempts, please try again later',
  event: 'OAuth callback rate limit exceeded',
});
