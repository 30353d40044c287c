import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Map errors to `{ detail }` JSON responses
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof AppError) {
    if (error.status >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${error.message}`);
    }
    res.status(error.status).json({ detail: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      detail: 'Validation failed',
      errors: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
    return;
  }

  if (error instanceof multer.MulterError) {
    res.status(error.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({ detail: error.message });
    return;
  }

  // body-parser and similar middleware errors carry their own 4xx status
  const status = clientErrorStatus(error);
  if (status !== null) {
    res.status(status).json({ detail: error instanceof Error ? error.message : 'Bad request' });
    return;
  }

  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  logger.error(`Unhandled error on ${req.method} ${req.path}: ${message}`);
  res.status(500).json({ detail: 'Internal server error' });
};
