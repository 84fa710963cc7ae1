/**
 * Error Handling Middleware
 * API error type, async route wrapper and the final Express error handler
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '../config/env';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejected promises from async route handlers to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      success: false,
      error: err.message,
    });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, err);

  const message = err instanceof Error ? err.message : String(err);
  res.status(500).json({
    success: false,
    error: env.NODE_ENV === 'production' ? 'Internal server error' : message,
  });
}
