/**
 * JWT utilities
 *
 * Verification of employee access tokens. Signing is kept for local tooling
 * and tests; production tokens come from the identity service that shares the
 * secret.
 *
 * @module utils/jwt
 */

import jwt, { type SignOptions, type VerifyOptions } from 'jsonwebtoken';

import { getAuthConfig } from '../config/auth.js';
import { isJWTPayload, type TokenValidationResult } from '../types/auth.js';
import { type UserRole } from '../types/index.js';

/**
 * Sign an access token for an employee
 *
 * @example
 * const token = generateAccessToken('user-123', 'dana@example.com', UserRole.Employee);
 */
export function generateAccessToken(userId: string, email: string, role: UserRole): string {
  const config = getAuthConfig();

  const signOptions: SignOptions = {
    algorithm: 'HS256',
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    expiresIn: config.jwt.expiresInSeconds,
  };

  return jwt.sign({ userId, email, role, type: 'access' }, config.jwt.secret, signOptions);
}

/**
 * Verify and decode an access token
 */
export function verifyAccessToken(token: string, correlationId?: string): TokenValidationResult {
  const timestamp = new Date();
  const config = getAuthConfig();

  const verifyOptions: VerifyOptions = {
    algorithms: ['HS256'],
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
  };

  try {
    const decoded = jwt.verify(token, config.jwt.secret, verifyOptions);

    if (!isJWTPayload(decoded)) {
      console.warn('[JWT] Invalid access token payload structure:', {
        correlationId,
        timestamp: timestamp.toISOString(),
      });

      return {
        valid: false,
        error: 'Invalid token payload structure',
        errorCode: 'MALFORMED',
        timestamp,
      };
    }

    return { valid: true, payload: decoded, timestamp };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    let errorCode: 'EXPIRED' | 'INVALID' | 'MALFORMED' = 'INVALID';

    if (error instanceof jwt.TokenExpiredError) {
      errorCode = 'EXPIRED';
    } else if (error instanceof jwt.JsonWebTokenError) {
      errorCode = 'MALFORMED';
    }

    console.warn('[JWT] Access token verification failed:', {
      error: errorMessage,
      errorCode,
      correlationId,
      timestamp: timestamp.toISOString(),
    });

    return { valid: false, error: errorMessage, errorCode, timestamp };
  }
}

/**
 * Extract the token from a `Bearer <token>` authorization header
 */
export function extractTokenFromHeader(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2) {
    return null;
  }

  const [scheme, token] = parts;

  if (scheme !== 'Bearer' || !token || token.trim().length === 0) {
    return null;
  }

  return token.trim();
}
