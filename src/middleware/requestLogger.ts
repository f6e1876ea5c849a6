import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

interface RequestLogContext {
  method: string;
  path: string;
  ip: string | undefined;
  userAgent: string | undefined;
  requestId?: string;
}

interface ResponseLogContext extends RequestLogContext {
  statusCode: number;
  responseTime: number;
}

/**
 * Middleware to log incoming HTTP requests and responses
 */
export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  // Generate a unique request ID
  const requestId = `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;

  // Attach request ID to request object for tracing
  req.requestId = requestId;

  const requestContext: RequestLogContext = {
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    requestId,
  };

  logger.info('Incoming request', requestContext);

  res.on('finish', () => {
    const responseContext: ResponseLogContext = {
      ...requestContext,
      statusCode: res.statusCode,
      responseTime: Date.now() - startTime,
    };

    // Log based on status code
    if (res.statusCode >= 500) {
      logger.error('Request failed', responseContext);
    } else if (res.statusCode >= 400) {
      logger.warn('Request client error', responseContext);
    } else {
      logger.info('Request completed', responseContext);
    }
  });

  next();
}

/**
 * Get request ID from request object
 */
export function getRequestId(req: Request): string | undefined {
  return req.requestId;
}
