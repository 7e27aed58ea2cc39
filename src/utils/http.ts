/**
 * HTTP response helpers shared by controllers and middleware
 *
 * @module utils/http
 */

import { type NextFunction, type Request, type Response } from 'express';

import { type AuthenticatedRequest, type JWTPayload } from '../types/auth.js';
import { statusForErrorCode } from '../types/errors.js';
import { type ApiErrorResponse, type ServiceOperationResult } from '../types/index.js';

import { isUuid } from './request-parsers.js';

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * Correlation ID from the `x-correlation-id` header, or a new one
 */
export function getCorrelationId(req: Request, prefix: string): string {
  const existing = req.get('x-correlation-id');
  if (existing) {
    return existing;
  }
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`;
}

export function sendError(
  res: Response,
  statusCode: number,
  code: string,
  message: string,
  details?: Record<string, unknown>
): void {
  const body: ApiErrorResponse = {
    success: false,
    code,
    message,
    ...(details !== undefined && { details }),
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(body);
}

/**
 * Send a service result: data on success, the mapped error otherwise
 */
export function sendResult<T>(
  res: Response,
  result: ServiceOperationResult<T>,
  successStatus: number = HTTP_STATUS.OK,
  message?: string
): void {
  if (result.success) {
    res.status(successStatus).json({
      success: true,
      ...(message !== undefined && { message }),
      data: result.data,
    });
    return;
  }

  sendError(
    res,
    statusForErrorCode(result.errorCode),
    result.errorCode ?? 'INTERNAL_ERROR',
    result.error ?? 'An unexpected error occurred',
    result.details
  );
}

/**
 * Authenticated employee, or a 401 response when there is none
 */
export function requireUser(req: AuthenticatedRequest, res: Response): JWTPayload | null {
  if (req.user) {
    return req.user;
  }
  sendError(res, HTTP_STATUS.UNAUTHORIZED, 'AUTHENTICATION_REQUIRED', 'Authentication required');
  return null;
}

/**
 * Single string route parameter
 */
export function routeParam(req: Request, name: string): string {
  const value = req.params[name];
  return typeof value === 'string' ? value : '';
}

/**
 * `router.param` handler answering 400 before any handler runs when an id
 * parameter is not a UUID
 */
export function requireUuidParam(_req: Request, res: Response, next: NextFunction, value: unknown, name: string): void {
  if (isUuid(value)) {
    next();
    return;
  }
  sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', `${name} must be a UUID`);
}

/**
 * Log an exception that escaped a controller and answer 500
 */
export function sendUnexpectedError(
  res: Response,
  tag: string,
  operation: string,
  error: unknown,
  context: { correlationId: string; startTime: number }
): void {
  console.error(`[${tag}] ${operation} error:`, {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    correlationId: context.correlationId,
    executionTimeMs: Date.now() - context.startTime,
    timestamp: new Date().toISOString(),
  });
  sendError(res, HTTP_STATUS.INTERNAL_SERVER_ERROR, 'INTERNAL_ERROR', 'An unexpected error occurred');
}
