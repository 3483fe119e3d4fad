import { Request, Response, NextFunction, RequestHandler } from 'express';
import logger from '@/config/logger';
import { ErrorResponse, StoreError, ValidationIssue } from '@/types';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: ValidationIssue[]
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export const createError = (
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: ValidationIssue[]
): AppError => new AppError(message, statusCode, code, details);

export const fromStoreError = (error: StoreError): AppError =>
  new AppError(error.message, error.kind === 'StoreUnavailable' ? 503 : 500, 'STORE_ERROR');

function isBodyParserError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (isBodyParserError(err)) {
    return new AppError('Malformed JSON body', 400, 'INVALID_JSON');
  }
  if (err instanceof Error) {
    const wrapped = new AppError(err.message);
    wrapped.stack = err.stack;
    return wrapped;
  }
  return new AppError(String(err));
}

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // express recognises error middleware by its four parameters
  _next: NextFunction
): void => {
  const { statusCode, message, code, details, stack } = toAppError(err);
  const env = process.env.NODE_ENV || 'development';

  // the response already went out, typically as a 408 from the request timeout
  if (res.headersSent) {
    logger.warn('Error after response was sent:', { message, code, url: req.url, method: req.method });
    return;
  }

  logger.error('Error occurred:', {
    statusCode,
    message,
    code,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
    stack: env === 'development' ? stack : undefined
  });

  // no internals leak from 5xx responses in production
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message: env === 'production' && statusCode >= 500
        ? 'Internal server error'
        : message,
      ...(details ? { details } : {})
    },
    timestamp: new Date()
  };

  if (env === 'development') {
    response.stack = stack;
  }

  res.status(statusCode).json(response);
};

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => (req, res, next) => {
  fn(req, res, next).catch(next);
};
