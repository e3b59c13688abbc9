import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../services/auth.service';
import { AuthUser } from '../types';
import '../types/express';
import { ApiError } from '../utils/ApiError';
import { asyncHandler } from '../utils/asyncHandler';

function getBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) return null;
  const token = authHeader.split(' ')[1];
  return token || null;
}

/** Resolves the bearer token to the stored, active user and sets `req.user`. */
export const createAuthenticate = (auth: AuthService): RequestHandler =>
  asyncHandler(async (req: Request, _res: Response, next: NextFunction) => {
    const token = getBearerToken(req);
    if (!token) throw ApiError.unauthorized('No token provided');

    req.user = await auth.resolveActor(token);
    next();
  });

/** The authenticated caller; routes behind `authenticate` always have one. */
export function currentUser(req: Request): AuthUser {
  if (!req.user) {
    throw ApiError.unauthorized('Authentication required');
  }
  return req.user;
}
