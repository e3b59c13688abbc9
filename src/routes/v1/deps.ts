import { RequestHandler } from 'express';
import { RateLimiters } from '../../middleware/rateLimit.middleware';
import { Services } from '../../services';

/** What every v1 router is built from. */
export interface RouteDeps {
  services: Services;
  authenticate: RequestHandler;
  limiters: RateLimiters;
}
