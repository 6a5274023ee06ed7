import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../utils/logger.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export const requestLogger =
  (logger: Logger): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    // Generate unique request ID for tracing
    req.requestId = uuidv4();
    res.setHeader('X-Request-ID', req.requestId);

    const startTime = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      const logData = {
        requestId: req.requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: `${duration}ms`,
        ip: req.ip,
        userAgent: req.get('user-agent'),
        actorId: req.actorId,
      };

      if (res.statusCode >= 400) {
        logger.warn('Request completed with error', logData);
      } else {
        logger.debug('Request completed', logData);
      }
    });

    next();
  };
