import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('validation');

/** Strip HTML tags from every string in a JSON body. */
export function stripTags(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/<[^>]*>/g, '').trim();
  }
  if (Array.isArray(value)) {
    return value.map(stripTags);
  }
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = stripTags(v);
    }
    return out;
  }
  return value;
}

export interface ValidationErrorResponse {
  error: 'Validation failed';
  details: Array<{ field: string; message: string }>;
}

export const formatZodError = (error: ZodError): ValidationErrorResponse => ({
  error: 'Validation failed',
  details: error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message
  }))
});

function rejectInvalid(req: Request, res: Response, error: ZodError, part: string): void {
  const formatted = formatZodError(error);
  logger.warn({ path: req.path, part, errors: formatted.details }, 'Validation failed');
  res.status(400).json(formatted);
}

export const validateBody = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(stripTags(req.body));
    if (!result.success) {
      rejectInvalid(req, res, result.error, 'body');
      return;
    }
    req.body = result.data;
    next();
  };
};

/** Parsed query values go to `res.locals.query`; Express keeps `req.query` as raw strings. */
export const validateQuery = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      rejectInvalid(req, res, result.error, 'query');
      return;
    }
    res.locals.query = result.data;
    next();
  };
};
