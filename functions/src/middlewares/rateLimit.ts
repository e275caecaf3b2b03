import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';
import { rateLimitConfig } from '../config';
import { RateLimitError } from '../services/errors';
import { failed, sendEnvelope } from '../utils/apiResponse';

/**
 * General API rate limiter, per IP.
 */
export const apiLimiter = rateLimit({
  windowMs: rateLimitConfig.windowMs,
  max: rateLimitConfig.max,
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
    sendEnvelope(res, failed(new RateLimitError()));
  },
});
