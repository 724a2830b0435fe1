// Centralized error handling
import { Request, Response, NextFunction, RequestHandler } from 'express';

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  code?: string | null;
  details?: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    options?: { isOperational?: boolean; code?: string; details?: unknown }
  ) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = options?.isOperational ?? true;
    this.code = options?.code ?? null;
    this.details = options?.details ?? null;
    Error.captureStackTrace(this, this.constructor);
  }
}

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown
): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

export const errorHandler = (err: Error, _req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  if (process.env.NODE_ENV === 'development') {
    console.error('Error:', err);
  } else if (process.env.NODE_ENV !== 'test') {
    console.error('Error:', err.message);
  }

  if (err instanceof AppError && err.isOperational) {
    const payload: Record<string, unknown> = {
      error: err.message,
    };
    if (err.code) payload.code = err.code;
    if (err.details) payload.details = err.details;
    if (process.env.NODE_ENV === 'development' && err.stack) {
      payload.stack = err.stack;
    }
    return res.status(err.statusCode).json(payload);
  }

  // express.json() parse failures
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ error: 'Malformed JSON body' });
  }

  res.status(500).json({
    error: process.env.NODE_ENV === 'production'
      ? 'Internal server error'
      : err.message,
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack })
  });
};
