/**
 * Error Handler Middleware
 *
 * Centralized error handling for the Express application.
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

/**
 * Application error with an HTTP status, a stable machine-readable code
 * and whether retrying the operation can succeed.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly isOperational: boolean;

  constructor(statusCode: number, message: string, code = 'APP_ERROR', retryable = false, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.retryable = retryable;
    this.isOperational = isOperational;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string): AppError {
    return new AppError(400, message, 'BAD_REQUEST');
  }

  static notFound(message: string): AppError {
    return new AppError(404, message, 'NOT_FOUND');
  }

  static conflict(message: string): AppError {
    return new AppError(409, message, 'CONFLICT');
  }

  static internal(message: string): AppError {
    return new AppError(500, message, 'INTERNAL', false, false);
  }
}

/**
 * Express error handling middleware.
 * Should be registered after all routes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error(`[Error] ${req.method} ${req.path}:`, err.message);

  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(process.env['NODE_ENV'] === 'development' && { stack: err.stack })
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      details: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    });
    return;
  }

  if (err.name === 'SyntaxError' && 'body' in err) {
    res.status(400).json({
      error: 'Invalid JSON in request body',
      code: 'BAD_REQUEST'
    });
    return;
  }

  // Default to 500 for unknown errors
  console.error('[Error] Unhandled error:', err);
  res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL',
    ...(process.env['NODE_ENV'] === 'development' && {
      details: err.message,
      stack: err.stack
    })
  });
}

/**
 * 404 handler for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND'
  });
}
