import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { env } from '../config/env';
import { AppError } from '../errors/app.errors';
import { logger } from '../utils/logger.util';

/** body-parser failures (malformed JSON, oversized body) carry a `type` and a 4xx `status`. */
function bodyParserStatus(err: Error): number | undefined {
  if ('type' in err && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return err.status;
  }
  return undefined;
}

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({ success: false, error: 'Validation failed', details: err.flatten() });
    return;
  }

  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== undefined) {
    logger.warn('Rejected unreadable request body', {
      method: req.method,
      url: req.originalUrl,
      error: err.message,
    });
    res.status(parserStatus).json({ success: false, error: 'Invalid request body' });
    return;
  }

  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const meta = { method: req.method, url: req.originalUrl, statusCode };
  if (statusCode >= 500) {
    logger.error('Request failed', err, meta);
  } else {
    logger.warn(err.message, meta);
  }

  const exposeMessage = statusCode < 500 || env.NODE_ENV === 'development';
  res.status(statusCode).json({
    success: false,
    error: exposeMessage ? err.message : 'Internal server error',
    ...(env.NODE_ENV === 'development' && { stack: err.stack }),
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ success: false, error: `Route ${req.method} ${req.path} not found` });
}
