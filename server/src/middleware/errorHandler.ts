import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import crypto from 'crypto';
import { isProduction } from '../config/env.js';
import { logger } from '../services/logger.js';
import { currentRequestId } from './requestLogger.js';
import { AppError } from '../utils/AppError.js';
import type { ApiErrorResponse } from '../../../shared/types/index.js';

/**
 * Error Handler Middleware
 *
 * Provides consistent error responses while hiding internal details in production.
 * Logs full error details server-side with a reference for support.
 */

interface ResolvedError {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
  operational: boolean;
}

/**
 * Generate error reference ID for tracking
 */
function generateErrorRef(): string {
  return crypto.randomBytes(8).toString('hex').toUpperCase();
}

/**
 * Body parser failures (malformed JSON, oversized payloads) carry a type and a status
 */
function isBodyParserError(error: unknown): error is Error & { type: string; status: number } {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

/**
 * Map Zod validation errors to user-friendly format
 */
function handleZodError(error: ZodError): ResolvedError {
  const issues = error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message
  }));

  return {
    statusCode: 400,
    code: 'VALIDATION_ERROR',
    message: 'Validation failed',
    details: issues,
    operational: true
  };
}

function resolveError(err: Error): ResolvedError {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      code: err.code,
      message: err.message,
      details: err.details,
      operational: err.isOperational
    };
  }
  if (err instanceof ZodError) {
    return handleZodError(err);
  }
  if (isBodyParserError(err)) {
    return {
      statusCode: err.status,
      code: err.status === 413 ? 'PAYLOAD_TOO_LARGE' : 'VALIDATION_ERROR',
      message: err.type === 'entity.parse.failed' ? 'Request body is not valid JSON' : err.message,
      operational: true
    };
  }
  return {
    statusCode: 500,
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    operational: false
  };
}

/**
 * Central error handling middleware
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const errorRef = generateErrorRef();
  const isProd = isProduction();
  const resolved = resolveError(err);

  const logDetails = {
    message: err.message,
    path: req.path,
    method: req.method,
    requestId: currentRequestId() ?? req.headers['x-request-id']
  };
  if (resolved.operational) {
    logger.warn(`[${errorRef}] ${resolved.code}:`, logDetails);
  } else {
    logger.error(`[${errorRef}] ${resolved.code}:`, { ...logDetails, stack: err.stack });
  }

  const response: ApiErrorResponse & { stack?: string[] } = {
    error: resolved.code,
    // Internal failures never leak their message in production
    message: isProd && !resolved.operational ? 'An unexpected error occurred' : resolved.message,
    reference: errorRef
  };

  // Validation details are always shown
  if (resolved.details !== undefined && (resolved.operational || !isProd)) {
    response.details = resolved.details;
  }

  // In development, include stack trace
  if (!isProd && !resolved.operational && err.stack) {
    response.stack = err.stack.split('\n');
  }

  res.status(resolved.statusCode).json(response);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ApiErrorResponse = {
    error: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`
  };
  res.status(404).json(response);
}
