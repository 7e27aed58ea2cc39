/**
 * Authorization Middleware
 *
 * Role-based access control for employee routes. Runs after `authenticate`.
 * Finer rules, such as "only the requester's manager", belong to the
 * workflow services.
 *
 * @module middleware/authorize
 */

import { type NextFunction, type Response } from 'express';

import { type AuthenticatedRequest } from '../types/auth.js';
import { UserRole } from '../types/index.js';
import { HTTP_STATUS, sendError } from '../utils/http.js';

/**
 * Roles with access to every employee route
 */
export const ALL_ROLES: readonly UserRole[] = [UserRole.HRAdmin, UserRole.Manager, UserRole.Employee];

/**
 * Authorization Middleware Factory
 *
 * @example
 * router.post('/', authorize([UserRole.HRAdmin]), createCycle);
 */
export function authorize(
  allowedRoles: readonly UserRole[]
): (req: AuthenticatedRequest, res: Response, next: NextFunction) => void {
  if (allowedRoles.length === 0) {
    throw new Error('[AUTHZ] authorize() requires at least one allowed role');
  }

  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const user = req.user;

    if (!user) {
      console.error('[AUTHZ] Authorization failed:', {
        correlationId: req.correlationId,
        path: req.path,
        reason: 'not authenticated',
        timestamp: new Date().toISOString(),
      });
      sendError(res, HTTP_STATUS.UNAUTHORIZED, 'AUTHENTICATION_REQUIRED', 'Authentication required');
      return;
    }

    if (!allowedRoles.includes(user.role)) {
      console.error('[AUTHZ] Authorization failed:', {
        correlationId: req.correlationId,
        path: req.path,
        userId: user.userId,
        userRole: user.role,
        allowedRoles,
        timestamp: new Date().toISOString(),
      });
      sendError(
        res,
        HTTP_STATUS.FORBIDDEN,
        'INSUFFICIENT_PERMISSIONS',
        'Insufficient permissions. User does not have required role.',
        { allowedRoles: [...allowedRoles] }
      );
      return;
    }

    next();
  };
}
