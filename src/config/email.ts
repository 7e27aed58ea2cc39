/**
 * Email Configuration Module
 *
 * SMTP settings for notification delivery. Delivery can be switched off with
 * EMAIL_ENABLED=false, in which case no SMTP variables are required.
 *
 * @module config/email
 */

import { getEnvironment, parseBoolean, parseInteger, readEnv, type Environment } from './env.js';

const TAG = 'EMAIL_CONFIG';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * SMTP authentication credentials
 */
export interface SMTPAuth {
  readonly user: string;
  readonly pass: string;
}

/**
 * Email service configuration
 */
export interface EmailConfig {
  /**
   * SMTP server hostname
   */
  readonly host: string;

  /**
   * SMTP server port; 465 implies implicit TLS
   */
  readonly port: number;

  /**
   * Use implicit TLS
   */
  readonly secure: boolean;

  /**
   * Optional credentials
   */
  readonly auth?: SMTPAuth;

  /**
   * Sender address, plain or "Name <address>"
   */
  readonly from: string;

  /**
   * Connection timeout in milliseconds
   */
  readonly connectionTimeout: number;

  /**
   * Socket timeout in milliseconds
   */
  readonly socketTimeout: number;

  /**
   * Delivery attempts before giving up
   */
  readonly maxRetries: number;

  /**
   * Whether delivery is enabled
   */
  readonly enabled: boolean;

  /**
   * Current environment
   */
  readonly environment: Environment;
}

/**
 * Extract the address part of a "Name <address>" sender
 */
export function extractAddress(from: string): string | undefined {
  if (!from.includes('<')) {
    return from;
  }
  return from.match(/<([^>]+)>/)?.[1];
}

function loadEmailConfig(): EmailConfig {
  const environment = getEnvironment();
  const enabled = parseBoolean(readEnv('EMAIL_ENABLED'), true, 'EMAIL_ENABLED', TAG);
  const connectionTimeout = parseInteger(
    readEnv('EMAIL_CONNECTION_TIMEOUT'),
    10000,
    1000,
    120000,
    'EMAIL_CONNECTION_TIMEOUT',
    TAG
  );
  const socketTimeout = parseInteger(
    readEnv('EMAIL_SOCKET_TIMEOUT'),
    10000,
    1000,
    120000,
    'EMAIL_SOCKET_TIMEOUT',
    TAG
  );
  const maxRetries = parseInteger(readEnv('EMAIL_MAX_RETRIES'), 3, 1, 10, 'EMAIL_MAX_RETRIES', TAG);

  if (!enabled) {
    console.log(`[${TAG}] Email delivery is disabled (EMAIL_ENABLED=false)`);
    return {
      host: 'localhost',
      port: 587,
      secure: false,
      from: readEnv('EMAIL_FROM') ?? 'noreply@example.com',
      connectionTimeout,
      socketTimeout,
      maxRetries,
      enabled: false,
      environment,
    };
  }

  const host = readEnv('SMTP_HOST');
  if (!host) {
    throw new Error(`[${TAG}] SMTP_HOST environment variable is required`);
  }

  const port = parseInteger(readEnv('SMTP_PORT'), 587, 1, 65535, 'SMTP_PORT', TAG);

  const user = readEnv('SMTP_USER');
  const pass = readEnv('SMTP_PASSWORD');
  if ((user === undefined) !== (pass === undefined)) {
    throw new Error(`[${TAG}] Both SMTP_USER and SMTP_PASSWORD must be provided together`);
  }

  const from = readEnv('EMAIL_FROM');
  if (!from) {
    throw new Error(`[${TAG}] EMAIL_FROM environment variable is required`);
  }

  const fromAddress = extractAddress(from);
  if (!fromAddress || !EMAIL_PATTERN.test(fromAddress)) {
    throw new Error(`[${TAG}] Invalid EMAIL_FROM format: ${from}`);
  }

  const config: EmailConfig = {
    host,
    port,
    secure: port === 465,
    auth: user !== undefined && pass !== undefined ? { user, pass } : undefined,
    from,
    connectionTimeout,
    socketTimeout,
    maxRetries,
    enabled: true,
    environment,
  };

  console.log(`[${TAG}] Email configuration loaded:`, getMaskedEmailConfig(config));

  return config;
}

let emailConfigInstance: EmailConfig | null = null;

/**
 * Get email configuration singleton
 *
 * @throws Error if required SMTP settings are missing
 */
export function getEmailConfig(): EmailConfig {
  if (!emailConfigInstance) {
    emailConfigInstance = loadEmailConfig();
  }
  return emailConfigInstance;
}

/**
 * Reset email configuration singleton (for testing)
 *
 * @internal
 */
export function resetEmailConfig(): void {
  emailConfigInstance = null;
}

/**
 * Configuration with the SMTP password masked, for logs
 */
export function getMaskedEmailConfig(config: EmailConfig): Record<string, unknown> {
  return {
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: config.auth ? { user: config.auth.user, pass: '***' } : undefined,
    from: config.from,
    maxRetries: config.maxRetries,
    enabled: config.enabled,
    environment: config.environment,
  };
}
