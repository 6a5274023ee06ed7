import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { ErrorCode, ValidationError, isEngineError, type EngineError, type FieldIssue } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

// HTTP-level error for request-shape problems caught before a service runs
export class AppError extends Error {
  statusCode: number;
  code: string;
  errors?: FieldIssue[];

  constructor(message: string, statusCode: number, code = 'REQUEST_ERROR', errors?: FieldIssue[]) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.errors = errors;

    Error.captureStackTrace(this, this.constructor);
  }
}

const ENGINE_STATUS: Record<EngineError['code'], number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.STORE_FAILURE]: 503,
};

interface ErrorBody {
  success: false;
  error: { code: string; message: string; details?: FieldIssue[] };
}

// body-parser attaches an HTTP status to the errors it raises
const httpStatusOf = (err: Error): number | undefined =>
  'status' in err && typeof err.status === 'number' ? err.status : undefined;

export const errorHandler = (logger: Logger, exposeInternals: boolean): ErrorRequestHandler =>
  (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = err instanceof Error ? err : new Error(String(err));
    let statusCode = 500;
    const body: ErrorBody = { success: false, error: { code: 'INTERNAL_ERROR', message: 'Internal Server Error' } };

    if (error instanceof AppError) {
      statusCode = error.statusCode;
      body.error = { code: error.code, message: error.message, ...(error.errors && { details: error.errors }) };
    } else if (isEngineError(error)) {
      statusCode = ENGINE_STATUS[error.code];
      body.error = { code: error.code, message: error.message };
      if (error instanceof ValidationError && error.details.length > 0) body.error.details = error.details;
      if (error.code === ErrorCode.STORE_FAILURE) body.error.message = 'The data store is unavailable';
    } else {
      const status = httpStatusOf(error);
      if (status !== undefined && status >= 400 && status < 500) {
        statusCode = status;
        body.error = { code: 'BAD_REQUEST', message: error.message };
      } else if (exposeInternals) {
        body.error.message = error.message;
      }
    }

    const logData = {
      requestId: req.requestId,
      path: req.path,
      method: req.method,
      statusCode,
      code: body.error.code,
      actorId: req.actorId,
    };
    if (statusCode >= 500) {
      logger.error(`Error: ${error.message}`, { ...logData, stack: error.stack });
    } else {
      logger.warn(`Request rejected: ${error.message}`, logData);
    }

    res.status(statusCode).json(body);
  };

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(new AppError(`Route not found: ${req.method} ${req.originalUrl}`, 404, 'ROUTE_NOT_FOUND'));
};

// Async handler wrapper
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };
