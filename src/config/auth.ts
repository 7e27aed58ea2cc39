/**
 * Authentication Configuration Module
 *
 * Employee access tokens are issued by the organisation's identity service
 * and verified here with a shared HS256 secret. External reviewers never hold
 * a JWT; their routes are rate limited per client address instead.
 *
 * @module config/auth
 */

import { getEnvironment, parseInteger, readEnv, type Environment } from './env.js';

const TAG = 'AUTH_CONFIG';

/**
 * Minimum secret length accepted for HS256 signing
 */
export const MIN_SECRET_LENGTH = 32;

/**
 * JWT verification settings
 */
export interface JWTConfig {
  /**
   * Shared signing secret
   */
  readonly secret: string;

  /**
   * Lifetime in seconds of tokens signed by this service (tests and tooling only)
   */
  readonly expiresInSeconds: number;

  /**
   * Expected issuer claim
   */
  readonly issuer: string;

  /**
   * Expected audience claim
   */
  readonly audience: string;
}

/**
 * Rate limit applied to external reviewer routes
 */
export interface RateLimitConfig {
  /**
   * Maximum requests per window and client
   */
  readonly maxRequests: number;

  /**
   * Window length in milliseconds
   */
  readonly windowMs: number;
}

/**
 * Complete authentication configuration
 */
export interface AuthConfig {
  readonly jwt: JWTConfig;
  readonly externalRateLimit: RateLimitConfig;
  readonly environment: Environment;
}

/**
 * Configuration validation error
 */
export interface ConfigValidationError {
  readonly field: string;
  readonly message: string;
}

function validateAuthConfig(config: AuthConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (config.jwt.secret.length < MIN_SECRET_LENGTH) {
    errors.push({
      field: 'jwt.secret',
      message: `JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters`,
    });
  }

  return errors;
}

function loadAuthConfig(): AuthConfig {
  const environment = getEnvironment();
  const secret = readEnv('JWT_SECRET');

  if (!secret) {
    throw new Error(`[${TAG}] JWT_SECRET environment variable is required`);
  }

  const config: AuthConfig = {
    jwt: {
      secret,
      expiresInSeconds: parseInteger(
        readEnv('JWT_EXPIRES_IN_SECONDS'),
        3600,
        60,
        7 * 24 * 3600,
        'JWT_EXPIRES_IN_SECONDS',
        TAG
      ),
      issuer: readEnv('JWT_ISSUER') ?? 'feedback-workflow',
      audience: readEnv('JWT_AUDIENCE') ?? 'feedback-workflow-api',
    },
    externalRateLimit: {
      maxRequests: parseInteger(
        readEnv('EXTERNAL_RATE_LIMIT_MAX'),
        60,
        1,
        10000,
        'EXTERNAL_RATE_LIMIT_MAX',
        TAG
      ),
      windowMs: parseInteger(
        readEnv('EXTERNAL_RATE_LIMIT_WINDOW_MS'),
        15 * 60 * 1000,
        1000,
        24 * 60 * 60 * 1000,
        'EXTERNAL_RATE_LIMIT_WINDOW_MS',
        TAG
      ),
    },
    environment,
  };

  const errors = validateAuthConfig(config);
  if (errors.length > 0) {
    throw new Error(
      `[${TAG}] Invalid authentication configuration:\n${errors
        .map((error) => `${error.field}: ${error.message}`)
        .join('\n')}`
    );
  }

  console.log(`[${TAG}] Authentication configuration loaded:`, {
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    expiresInSeconds: config.jwt.expiresInSeconds,
    secretLength: config.jwt.secret.length,
    externalRateLimit: config.externalRateLimit,
    environment,
  });

  return config;
}

let authConfigInstance: AuthConfig | null = null;

/**
 * Get authentication configuration singleton
 *
 * @throws Error if JWT_SECRET is missing or too short
 */
export function getAuthConfig(): AuthConfig {
  if (!authConfigInstance) {
    authConfigInstance = loadAuthConfig();
  }
  return authConfigInstance;
}

/**
 * Reset authentication configuration singleton (for testing)
 *
 * @internal
 */
export function resetAuthConfig(): void {
  authConfigInstance = null;
}
