import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

const pgErrorCode = (err: unknown): string | undefined => {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};

// Express recognises error handlers by their four parameters
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  if (err instanceof multer.MulterError) {
    return ResponseHandler.badRequest(res, err.message, { field: err.field });
  }

  // Raised by body-parser on malformed JSON
  if (err instanceof SyntaxError && 'body' in err) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  const code = pgErrorCode(err);

  if (code === '23505') { // unique violation
    return ResponseHandler.conflict(res, 'Already exists');
  }

  if (code === '23503') { // foreign key violation
    return ResponseHandler.error(res, 'Referenced entity does not exist', 400, {
      code: 'FOREIGN_KEY_VIOLATION',
    });
  }

  if (code === '22003') { // numeric value out of range
    return ResponseHandler.error(res, 'Value out of range', 400, { code: 'INVALID_INPUT' });
  }

  const error = err instanceof Error ? err : new Error(String(err));

  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
