import { Request, Response, NextFunction } from 'express';
import { AppException, ErrorCode } from '../utils/exceptions';
import { metrics } from '../services/metrics.service';
import { logger } from '../config/logger.config';
import { env } from '../config/env.config';

export const errorHandler = (
  err: Error | AppException,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof AppException) {
    metrics.increment('errors_total', { code: err.errorCode });
    logger.warn('Application error', {
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
    });

    return res.status(err.statusCode).json({
      error: {
        code: err.errorCode,
        message: err.message,
      },
    });
  }

  // Body parser failures carry their own 4xx status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    metrics.increment('errors_total', { code: ErrorCode.VALIDATION_ERROR });
    return res.status(400).json({
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Malformed JSON body',
      },
    });
  }

  metrics.increment('errors_total', { code: ErrorCode.INTERNAL_ERROR });
  const logPayload: Record<string, unknown> = {
    error: err.message,
    path: req.path,
    method: req.method,
  };
  if (env.NODE_ENV !== 'production') {
    logPayload.stack = err.stack;
  } else {
    logPayload.errorType = err.constructor.name;
  }
  logger.error('Unexpected error', logPayload);

  return res.status(500).json({
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An error occurred while processing your request',
    },
  });
};
