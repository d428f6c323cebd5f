// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Classes and Terminal Express Middleware
// ═══════════════════════════════════════════════════════════════════════════════
//
// Routes throw ApiError subclasses (or pass service AppErrors through
// `fromAppError`); `errorHandler` renders every error as
//
//   { error, code, details?, requestId?, timestamp }
//
// 5xx responses are logged and, in production, stripped of their message and
// details.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

import { loadEnvironmentConfig } from '../../config/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { ErrorCode, type AppError } from '../../types/result.js';

const logger = getLogger({ component: 'error-handler' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  /** False for programming or infrastructure faults */
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends ApiError {
  constructor(message: string = 'Access denied') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class RateLimitError extends ApiError {
  readonly retryAfter: number;

  constructor(retryAfter: number) {
    super('Too many requests', 429, 'RATE_LIMITED', { retryAfter });
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class InternalError extends ApiError {
  constructor(message: string = 'Internal server error', details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details, false);
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// APP ERROR MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

const APP_ERROR_STATUS: Readonly<Record<string, number>> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  UNAUTHORIZED: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.REMINDER_NOT_FOUND]: 404,
  RATE_LIMITED: 429,
  [ErrorCode.PROVIDER_ERROR]: 502,
  [ErrorCode.NOTIFICATION_ERROR]: 502,
  [ErrorCode.STORE_ERROR]: 503,
  [ErrorCode.TIMEOUT]: 504,
};

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    typeof value.code === 'string' &&
    typeof value.message === 'string'
  );
}

/**
 * Convert a service-layer AppError into the ApiError the handler renders.
 */
export function fromAppError(error: AppError): ApiError {
  const statusCode = APP_ERROR_STATUS[error.code] ?? 500;
  return new ApiError(error.message, statusCode, error.code, error.context, statusCode < 500);
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

function normalize(error: unknown): ApiError {
  if (error instanceof ApiError) return error;

  if (error instanceof ZodError) {
    const flattened = error.flatten();
    return new ValidationError('Validation failed', {
      fields: flattened.fieldErrors,
      ...(flattened.formErrors.length > 0 && { form: flattened.formErrors }),
    });
  }

  if (error instanceof SyntaxError && 'body' in error) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }

  if (isAppError(error)) return fromAppError(error);

  return new InternalError(error instanceof Error ? error.message : String(error));
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const apiError = normalize(error);
  const isServerError = apiError.statusCode >= 500;
  const isProduction = loadEnvironmentConfig().isProduction;

  if (isServerError) {
    logger.error('Request failed', error, {
      method: req.method,
      path: req.path,
      code: apiError.code,
      requestId: req.requestId,
    });
  } else {
    logger.debug('Request rejected', { method: req.method, path: req.path, code: apiError.code });
  }

  if (apiError instanceof RateLimitError) {
    res.setHeader('Retry-After', String(apiError.retryAfter));
  }

  const hideInternals = isServerError && isProduction;
  const body: ErrorBody = {
    error: hideInternals ? 'An unexpected error occurred' : apiError.message,
    code: apiError.code,
    timestamp: new Date().toISOString(),
  };
  if (apiError.details && !hideInternals) body.details = apiError.details;
  if (req.requestId) body.requestId = req.requestId;

  res.status(apiError.statusCode).json(body);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ASYNC HANDLER
// ─────────────────────────────────────────────────────────────────────────────────

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Forward a rejected handler promise to `next`.
 */
export function asyncHandler(handler: AsyncRouteHandler): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  return async (req, res, next) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      next(error);
    }
  };
}
