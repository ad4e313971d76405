/**
 * Error classes and response helpers for the quote admin API.
 *
 * Every error the service raises on purpose extends QuoteDeskError so route
 * handlers can map it to an HTTP status and a consistent response body.
 */
import type { Response } from 'express';
import type { Logger } from '../logger';
import { metrics } from '../metrics';

export type ErrorDetails = Record<string, unknown>;

// Base error class for the service
export class QuoteDeskError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorDetails;

  constructor(message: string, code: string, statusCode: number, context?: ErrorDetails) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when input validation fails
 */
export class ValidationError extends QuoteDeskError {
  constructor(message: string, context?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Thrown when a quote or tag cannot be found
 */
export class NotFoundError extends QuoteDeskError {
  constructor(message: string, context?: ErrorDetails) {
    super(message, 'NOT_FOUND', 404, context);
  }
}

/**
 * Thrown when database operations fail
 */
export class DatabaseError extends QuoteDeskError {
  constructor(message: string, context?: ErrorDetails) {
    super(message, 'DATABASE_ERROR', 500, context);
  }
}

/**
 * Standard error response format for unexpected failures
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId?: string;
    details?: ErrorDetails;
  };
}

export interface ErrorContext {
  operation?: string;
  requestId?: string;
  quoteId?: string;
  tag?: string;
  [key: string]: unknown;
}

export function isQuoteDeskError(error: unknown): error is QuoteDeskError {
  return error instanceof QuoteDeskError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Extract safe error information for logging
 */
export function extractErrorInfo(error: Error): {
  message: string;
  name: string;
  code?: string;
  statusCode?: number;
  context?: ErrorDetails;
} {
  if (isQuoteDeskError(error)) {
    return {
      message: error.message,
      name: error.name,
      code: error.code,
      statusCode: error.statusCode,
      context: error.context,
    };
  }

  return { message: error.message, name: error.name };
}

export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  DATABASE_ERROR: 'DATABASE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export function createErrorResponse(error: Error, requestId?: string): ErrorResponse {
  if (isQuoteDeskError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        timestamp: new Date().toISOString(),
        requestId,
        details: error.context,
      },
    };
  }

  return {
    error: {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      timestamp: new Date().toISOString(),
      requestId,
    },
  };
}

export function logError(logger: Logger, error: Error, context?: ErrorContext): void {
  const errorInfo = extractErrorInfo(error);
  logger.error({ err: error, error: errorInfo, context }, `Error occurred: ${error.message}`);
  metrics.recordError(errorInfo.code ?? ERROR_CODES.INTERNAL_ERROR, context?.operation ?? 'unknown');
}

/**
 * Body for rejected input, shared with request schema failures so every 400
 * carries the same shape.
 */
export interface ValidationFailureResponse {
  error: 'Validation failed';
  details: string[];
}

export function createValidationFailure(details: string[]): ValidationFailureResponse {
  return { error: 'Validation failed', details };
}

/**
 * Log an error and answer with its status and the standard error body.
 * A ValidationError answers with the validation failure body instead.
 * Errors that are not QuoteDeskError become a 500 without leaking their message.
 */
export function handleApiError(
  logger: Logger,
  error: unknown,
  res: Response,
  operation: string,
  context?: ErrorContext,
): Response {
  const err = toError(error);
  const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;

  logError(logger, err, { operation, requestId, ...context });

  if (err instanceof ValidationError) {
    return res.status(err.statusCode).json(createValidationFailure([err.message]));
  }

  const status = isQuoteDeskError(err) ? err.statusCode : 500;
  return res.status(status).json(createErrorResponse(err, requestId));
}
