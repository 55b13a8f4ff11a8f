import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.config';
import { metrics } from '../services/metrics.service';

const SLOW_REQUEST_MS = 500;

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    metrics.increment('http_requests_total');
    metrics.recordDuration('http_request_duration_ms', duration);

    if (duration > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: duration,
      });
    }
  });

  next();
}
