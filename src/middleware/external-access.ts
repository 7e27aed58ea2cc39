/**
 * External Access Middleware
 *
 * Authenticates reviewers outside the organisation by the `x-external-email`
 * and `x-external-token` headers, and rate-limits their routes. A validated
 * token is bound to one request; when the route names a request the token
 * must belong to it.
 *
 * @module middleware/external-access
 */

import { type NextFunction, type Request, type Response } from 'express';
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

import { getAuthConfig } from '../config/auth.js';
import { externalAccessService, type ExternalAccessService } from '../services/external-access.service.js';
import { type ExternalAuthenticatedRequest } from '../types/auth.js';
import { statusForErrorCode } from '../types/errors.js';
import { HTTP_STATUS, getCorrelationId, sendError } from '../utils/http.js';

export const EXTERNAL_EMAIL_HEADER = 'x-external-email';
export const EXTERNAL_TOKEN_HEADER = 'x-external-token';

/**
 * Rate limiter for external reviewer routes, per client IP
 */
export function createExternalRateLimiter(): RateLimitRequestHandler {
  const { maxRequests, windowMs } = getAuthConfig().externalRateLimit;

  return rateLimit({
    windowMs,
    limit: maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      console.warn('[EXTERNAL_ACCESS] Rate limit exceeded:', {
        ip: req.ip,
        path: req.path,
        timestamp: new Date().toISOString(),
      });
      sendError(
        res,
        HTTP_STATUS.TOO_MANY_REQUESTS,
        'RATE_LIMIT_EXCEEDED',
        'Too many requests. Please try again later.'
      );
    },
  });
}

/**
 * External token authentication middleware factory
 */
export function authenticateExternal(
  service: ExternalAccessService = externalAccessService
): (req: ExternalAuthenticatedRequest, res: Response, next: NextFunction) => Promise<void> {
  return async (req: ExternalAuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    const correlationId = getCorrelationId(req, 'external');
    req.correlationId = correlationId;

    const email = req.get(EXTERNAL_EMAIL_HEADER);
    const token = req.get(EXTERNAL_TOKEN_HEADER);

    if (!email || !token) {
      sendError(res, HTTP_STATUS.UNAUTHORIZED, 'INVALID_TOKEN', 'Email and access token headers are required');
      return;
    }

    const requestId = typeof req.params.requestId === 'string' ? req.params.requestId : undefined;

    try {
      const result = await service.validate(email, token, requestId, correlationId);

      if (!result.success || !result.data) {
        sendError(
          res,
          statusForErrorCode(result.errorCode),
          result.errorCode ?? 'INVALID_TOKEN',
          result.error ?? 'Invalid or expired access token'
        );
        return;
      }

      req.external = result.data;
      next();
    } catch (error) {
      next(error);
    }
  };
}
