import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/ApiError';
import logger, { errorMeta } from '../config/logger';

const isBodyParseError = (err: Error): boolean => err instanceof SyntaxError && 'body' in err;

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  let error: ApiError;
  if (err instanceof ApiError) {
    error = err;
  } else if (isBodyParseError(err)) {
    error = ApiError.validation('Malformed JSON body');
  } else {
    error = new ApiError(500, err.message || 'Internal Server Error', 'INTERNAL_ERROR', undefined, false, err.stack);
  }

  const statusCode = error.statusCode || 500;
  const exposeMessage = error.isOperational || process.env.NODE_ENV === 'development';

  const response = {
    success: false,
    message: exposeMessage ? error.message : 'Internal Server Error',
    code: error.code,
    ...(error.details && { details: error.details }),
    ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
  };

  const line = `${statusCode} - ${error.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`;
  if (statusCode >= 500) {
    logger.error(line, errorMeta(err));
  } else {
    logger.warn(line);
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  const error = ApiError.notFound(`Route ${req.originalUrl} not found`);
  next(error);
};
