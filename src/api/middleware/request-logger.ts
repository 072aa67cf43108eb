import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import '../types';

export function createRequestLogger(options: { quiet: boolean }) {
  return function requestLogger(req: Request, res: Response, next: NextFunction): void {
    // Generate correlation ID for request tracing
    req.correlationId = crypto.randomUUID();
    res.setHeader('X-Correlation-Id', req.correlationId);

    if (options.quiet) {
      next();
      return;
    }

    const start = Date.now();
    console.log('[API Request]', {
      correlationId: req.correlationId,
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });

    res.on('finish', () => {
      console.log('[API Response]', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: `${Date.now() - start}ms`,
      });
    });

    next();
  };
}
