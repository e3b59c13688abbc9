import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodType } from 'zod';
import { ApiError, FieldErrors } from '../utils/ApiError';

type RequestShape = { body?: unknown; query?: unknown; params?: unknown };

/** Field → messages, keyed by the path below body/query/params. */
export const toFieldErrors = (error: ZodError): FieldErrors => {
  const details: FieldErrors = {};
  for (const issue of error.issues) {
    const path = issue.path.slice(1).join('.') || String(issue.path[0] ?? 'non_field_errors');
    (details[path] ??= []).push(issue.message);
  }
  return details;
};

/**
 * Validates body, query and params against `schema`. The parsed body replaces
 * `req.body`, so controllers see trimmed and normalized values.
 */
export const validate = (schema: ZodType<RequestShape>) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });
    if (!result.success) {
      throw ApiError.validation('Validation failed', toFieldErrors(result.error));
    }
    if (result.data.body !== undefined) {
      req.body = result.data.body;
    }
    next();
  };
};
