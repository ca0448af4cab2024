import { Request, Response, NextFunction } from 'express';
import logger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid startup configuration. Never reaches a client.
 */
export class ConfigError extends AppError {
  public readonly variable: string;

  constructor(message: string, variable: string) {
    super(message, 500, false);
    this.variable = variable;
  }
}

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  error: string;
}

/**
 * body-parser rejects malformed JSON with a SyntaxError tagged `entity.parse.failed`.
 */
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Format an error for JSON response.
 * Only operational AppErrors expose their message; everything else is reported
 * as a generic internal error.
 */
export function formatError(error: unknown): ErrorResponse {
  if (error instanceof AppError && error.isOperational) {
    return { error: error.message };
  }

  if (isBodyParseError(error)) {
    return { error: 'Malformed request body' };
  }

  return { error: 'Internal server error' };
}

/**
 * Get status code from error
 */
export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  if (isBodyParseError(error)) {
    return 400;
  }
  return 500;
}

/**
 * Express error handling middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = getErrorStatusCode(error);
  const response = formatError(error);

  if (statusCode >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'unhandled request error');
  }

  res.status(statusCode).json(response);
}

/**
 * Terminal 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
