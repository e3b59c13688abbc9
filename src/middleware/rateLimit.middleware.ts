import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Settings } from '../config/settings';
import { ApiError } from '../utils/ApiError';

export interface RateLimiters {
  general: RateLimitRequestHandler;
  auth: RateLimitRequestHandler;
}

type LimiterSettings = Pick<Settings, 'environment' | 'rateLimitWindowMs' | 'rateLimitMax'>;

export const createRateLimiters = (settings: LimiterSettings): RateLimiters => {
  const skip = () => settings.environment === 'test';

  return {
    general: rateLimit({
      windowMs: settings.rateLimitWindowMs,
      limit: settings.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      skip,
      handler: (_req, _res, next) => {
        next(ApiError.tooManyRequests('Too many requests from this IP, please try again later'));
      },
    }),
    auth: rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: 5,
      skipSuccessfulRequests: true,
      standardHeaders: true,
      legacyHeaders: false,
      skip,
      handler: (_req, _res, next) => {
        next(ApiError.tooManyRequests('Too many authentication attempts, please try again later'));
      },
    }),
  };
};
