import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

const statusOf = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return undefined;
};

const codeOf = (err: unknown): string | undefined =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const error = err instanceof Error ? err : new Error(String(err));

  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    query: req.query,
  });

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.issues);
  }

  // Malformed JSON body
  if (err instanceof SyntaxError && statusOf(err) === 400) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  const code = codeOf(err);

  if (code === '23505') { // Unique violation
    return ResponseHandler.error(res, 'Record already exists', 409, { code: 'CONFLICT' });
  }

  if (code === '23503') { // Foreign key violation
    return ResponseHandler.error(res, 'Invalid reference', 400, {
      code: 'FOREIGN_KEY_VIOLATION',
    });
  }

  const statusCode = statusOf(err) ?? 500;

  return ResponseHandler.error(
    res,
    statusCode === 500 ? 'Internal server error' : error.message,
    statusCode,
    {
      code: 'INTERNAL_ERROR',
      details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
    }
  );
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
