/**
 * Authentication type definitions
 *
 * Employee callers present a bearer JWT; external reviewers present an email
 * address and an opaque access token bound to a single feedback request.
 *
 * @module types/auth
 */

import { type Request } from 'express';

import { type WorkflowState } from './feedback.js';
import { isUserRole, type UserRole } from './index.js';

/**
 * JWT Access Token Payload
 */
export interface JWTPayload {
  /**
   * Unique identifier for the user
   */
  readonly userId: string;

  /**
   * User's email address
   */
  readonly email: string;

  /**
   * User's role in the system
   */
  readonly role: UserRole;

  /**
   * Token issued at timestamp (Unix epoch in seconds)
   */
  readonly iat: number;

  /**
   * Token expiration timestamp (Unix epoch in seconds)
   */
  readonly exp: number;

  /**
   * Token type identifier
   */
  readonly type: 'access';
}

/**
 * Result of verifying an access token
 */
export type TokenValidationResult =
  | {
      readonly valid: true;
      readonly payload: JWTPayload;
      readonly timestamp: Date;
    }
  | {
      readonly valid: false;
      readonly error: string;
      readonly errorCode: 'EXPIRED' | 'INVALID' | 'MALFORMED';
      readonly timestamp: Date;
    };

/**
 * Lifecycle status of an external access token, mirroring its request
 */
export enum AccessTokenStatus {
  Pending = 'PENDING',
  Accepted = 'ACCEPTED',
  Rejected = 'REJECTED',
  Completed = 'COMPLETED',
  Expired = 'EXPIRED',
}

/**
 * Request context established from a valid external access token
 */
export interface ExternalRequestContext {
  /**
   * Token row identifier
   */
  readonly tokenId: string;

  /**
   * Request the token is bound to
   */
  readonly requestId: string;

  /**
   * Cycle of the request
   */
  readonly cycleId: string;

  /**
   * External reviewer email, normalized to lower case
   */
  readonly email: string;

  /**
   * External reviewer display name
   */
  readonly displayName: string;

  /**
   * Name of the employee who asked for feedback
   */
  readonly requesterName: string;

  /**
   * Current workflow state of the request
   */
  readonly state: WorkflowState;
}

/**
 * Express request after bearer authentication
 */
export interface AuthenticatedRequest extends Request {
  /**
   * Authenticated employee
   */
  user?: JWTPayload;

  /**
   * Correlation ID for request tracing
   */
  correlationId?: string;
}

/**
 * Express request after external token authentication
 */
export interface ExternalAuthenticatedRequest extends Request {
  /**
   * Validated external reviewer context
   */
  external?: ExternalRequestContext;

  /**
   * Correlation ID for request tracing
   */
  correlationId?: string;
}

/**
 * Type guard to check if a value is a valid JWTPayload
 */
export function isJWTPayload(value: unknown): value is JWTPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'userId' in value &&
    typeof value.userId === 'string' &&
    'email' in value &&
    typeof value.email === 'string' &&
    'role' in value &&
    isUserRole(value.role) &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    'exp' in value &&
    typeof value.exp === 'number' &&
    'type' in value &&
    value.type === 'access'
  );
}
