import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/ApiError';
import { authorize, PolicyAction, PolicyResource } from '../utils/rolePolicy';
import { currentUser } from './auth.middleware';

export const authorizeAction = (action: PolicyAction, resource: PolicyResource) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const user = currentUser(req);
    if (!authorize(user, action, resource)) {
      throw ApiError.forbidden();
    }
    next();
  };
};
