/**
 * Authentication Middleware Module
 *
 * Verifies the bearer JWT on employee routes and attaches the caller to the
 * request. Tokens are issued by the identity provider; this service only
 * verifies them.
 *
 * @module middleware/authenticate
 */

import { type NextFunction, type Response } from 'express';

import { type AuthenticatedRequest } from '../types/auth.js';
import { HTTP_STATUS, getCorrelationId, sendError } from '../utils/http.js';
import { extractTokenFromHeader, verifyAccessToken } from '../utils/jwt.js';

const TOKEN_ERRORS = {
  EXPIRED: { code: 'TOKEN_EXPIRED', message: 'Authentication token has expired' },
  MALFORMED: { code: 'MALFORMED_TOKEN', message: 'Authentication token is malformed' },
  INVALID: { code: 'INVALID_TOKEN', message: 'Invalid authentication token' },
} as const;

/**
 * Authentication Middleware
 *
 * @example
 * router.use(authenticate);
 * router.get('/me', (req: AuthenticatedRequest, res) => res.json(req.user));
 */
export function authenticate(req: AuthenticatedRequest, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const correlationId = getCorrelationId(req, 'auth');
  req.correlationId = correlationId;

  const authHeader = req.get('authorization');

  if (!authHeader) {
    console.warn('[AUTH_MIDDLEWARE] Missing authorization header:', {
      correlationId,
      path: req.path,
      method: req.method,
      timestamp: new Date().toISOString(),
    });
    sendError(res, HTTP_STATUS.UNAUTHORIZED, 'MISSING_TOKEN', 'Authorization header is required');
    return;
  }

  const token = extractTokenFromHeader(authHeader);

  if (!token) {
    console.warn('[AUTH_MIDDLEWARE] Invalid authorization header format:', {
      correlationId,
      path: req.path,
      timestamp: new Date().toISOString(),
    });
    sendError(res, HTTP_STATUS.UNAUTHORIZED, 'INVALID_TOKEN_FORMAT', 'Authorization header must use Bearer scheme');
    return;
  }

  const validation = verifyAccessToken(token, correlationId);

  if (!validation.valid) {
    const failure = TOKEN_ERRORS[validation.errorCode];

    console.warn('[AUTH_MIDDLEWARE] Token validation failed:', {
      correlationId,
      path: req.path,
      errorCode: validation.errorCode,
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });
    sendError(res, HTTP_STATUS.UNAUTHORIZED, failure.code, failure.message);
    return;
  }

  req.user = validation.payload;

  console.log('[AUTH_MIDDLEWARE] Authentication successful:', {
    correlationId,
    path: req.path,
    userId: validation.payload.userId,
    role: validation.payload.role,
    executionTimeMs: Date.now() - startTime,
    timestamp: new Date().toISOString(),
  });

  next();
}
