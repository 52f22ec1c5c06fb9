import type { LoggerService } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';

/** Logs only what needs attention: 5xx, 4xx and slow requests. */
export function createHttpLoggingMiddleware(params: {
  logger: Pick<LoggerService, 'warn' | 'error'>;
  slowThresholdMs: number;
}) {
  const { logger, slowThresholdMs } = params;

  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const ms = Number(process.hrtime.bigint() - start) / 1e6;
      const status = res.statusCode;
      const msg = `${req.method} ${req.originalUrl || req.url} -> ${status} ${ms.toFixed(0)}ms`;

      if (status >= 500) logger.error(msg);
      else if (status >= 400) logger.warn(msg);
      else if (ms >= slowThresholdMs) logger.warn(`SLOW ${msg}`);
    });
    next();
  };
}
