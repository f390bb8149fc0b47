import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../config/logger.js';
import { AppError, NoMatchingTierError } from '../utils/errors.js';

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}

/**
 * Maps thrown errors to JSON responses.
 * Must be registered after every router.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    logger.warn('Request validation failed', { path: req.path, issues: err.errors.length });
    res.status(422).json({
      error: 'Invalid request',
      details: err.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
    return;
  }

  if (isMalformedJson(err)) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('Request failed', {
        path: req.path,
        code: err.code,
        error: err.message,
        stack: err.stack,
      });
      res.status(err.statusCode).json({ error: 'Internal server error', code: err.code });
      return;
    }

    logger.warn('Request rejected', { path: req.path, code: err.code, error: err.message });

    if (err instanceof NoMatchingTierError) {
      res.status(err.statusCode).json({
        error: err.message,
        code: err.code,
        available_amounts: err.availableAmounts,
      });
      return;
    }

    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  logger.error('Unhandled error', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    path: req.path,
  });
  res.status(500).json({ error: 'Internal server error' });
}
