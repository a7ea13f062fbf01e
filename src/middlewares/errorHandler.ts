import type { ErrorRequestHandler } from 'express';
import { AppError } from '../common/errors';
import { logger } from '../config/logger';

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof AppError) {
    return res.status(err.status).json({
      message: err.message,
      error_kind: err.kind,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
  }

  // body-parser failures carry their own 4xx status
  const status = typeof err?.status === 'number' && err.status >= 400 && err.status < 500 ? err.status : 500;
  if (status === 500) {
    logger.error({ err }, 'Unhandled error');
  }
  const message = status === 500 ? 'Internal Server Error' : String(err?.message || 'Bad Request');
  res.status(status).json({ message, error_kind: status === 500 ? 'InternalError' : 'BadRequest' });
};
