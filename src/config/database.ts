/**
 * Database Configuration Module
 *
 * Loads PostgreSQL connection settings from DATABASE_URL or the individual
 * DB_* variables, with pool sizing chosen per environment.
 *
 * @module config/database
 */

import { type PoolConfig } from 'pg';

import {
  getEnvironment,
  parseBoolean,
  parseChoice,
  parseInteger,
  readEnv,
  type Environment,
} from './env.js';

const TAG = 'DATABASE_CONFIG';

/**
 * Supported database SSL modes
 */
export type DatabaseSSLMode = 'disable' | 'prefer' | 'require' | 'verify-full';

const SSL_MODES: readonly DatabaseSSLMode[] = ['disable', 'prefer', 'require', 'verify-full'];

/**
 * Pool sizing and timeouts
 */
export interface DatabasePoolSettings {
  readonly min: number;
  readonly max: number;
  readonly idleTimeoutMillis: number;
  readonly connectionTimeoutMillis: number;
}

/**
 * Database connection configuration
 */
export interface DatabaseConfig {
  /**
   * Database host
   */
  readonly host: string;

  /**
   * Database port number
   */
  readonly port: number;

  /**
   * Database name
   */
  readonly database: string;

  /**
   * Database user
   */
  readonly user: string;

  /**
   * Database password
   */
  readonly password: string;

  /**
   * SSL mode
   */
  readonly ssl: DatabaseSSLMode;

  /**
   * Pool settings
   */
  readonly pool: DatabasePoolSettings;

  /**
   * Client-side query timeout in milliseconds
   */
  readonly queryTimeout: number;

  /**
   * Server-side statement timeout in milliseconds
   */
  readonly statementTimeout: number;

  /**
   * application_name reported to PostgreSQL
   */
  readonly applicationName: string;

  /**
   * Current environment
   */
  readonly environment: Environment;

  /**
   * Log every query
   */
  readonly enableLogging: boolean;
}

interface UrlConnection {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
}

/**
 * Parse a postgres:// or postgresql:// connection string
 */
function parseDatabaseURL(url: string | undefined): UrlConnection | null {
  if (!url) {
    return null;
  }

  try {
    const parsed = new URL(url);

    if (parsed.protocol !== 'postgresql:' && parsed.protocol !== 'postgres:') {
      console.warn(`[${TAG}] Invalid DATABASE_URL protocol: ${parsed.protocol}`);
      return null;
    }

    const connection: UrlConnection = {
      host: parsed.hostname,
      port: parsed.port ? Number.parseInt(parsed.port, 10) : 5432,
      database: parsed.pathname.slice(1),
      user: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };

    if (!connection.host || !connection.database || !connection.user) {
      console.warn(`[${TAG}] DATABASE_URL missing host, database or user`);
      return null;
    }

    return connection;
  } catch (error) {
    console.error(
      `[${TAG}] Failed to parse DATABASE_URL:`,
      error instanceof Error ? error.message : String(error)
    );
    return null;
  }
}

/**
 * Default pool sizing per environment
 */
function defaultPoolSettings(environment: Environment): DatabasePoolSettings {
  switch (environment) {
    case 'production':
      return { min: 5, max: 30, idleTimeoutMillis: 30000, connectionTimeoutMillis: 10000 };
    case 'staging':
      return { min: 2, max: 15, idleTimeoutMillis: 30000, connectionTimeoutMillis: 10000 };
    case 'test':
      return { min: 1, max: 5, idleTimeoutMillis: 10000, connectionTimeoutMillis: 5000 };
    case 'development':
    default:
      return { min: 2, max: 10, idleTimeoutMillis: 30000, connectionTimeoutMillis: 10000 };
  }
}

/**
 * Load database configuration
 *
 * DATABASE_URL takes precedence over DB_HOST, DB_PORT, DB_NAME, DB_USER and
 * DB_PASSWORD.
 */
function loadDatabaseConfig(): DatabaseConfig {
  const environment = getEnvironment();
  const url = parseDatabaseURL(readEnv('DATABASE_URL'));
  const defaults = defaultPoolSettings(environment);

  const min = parseInteger(readEnv('DB_POOL_MIN'), defaults.min, 0, 100, 'DB_POOL_MIN', TAG);
  const max = parseInteger(readEnv('DB_POOL_MAX'), defaults.max, 1, 200, 'DB_POOL_MAX', TAG);

  if (min > max) {
    console.warn(`[${TAG}] Pool min (${min}) is greater than max (${max}), adjusting min to ${max}`);
  }

  const config: DatabaseConfig = {
    host: url?.host ?? readEnv('DB_HOST') ?? 'localhost',
    port: url?.port ?? parseInteger(readEnv('DB_PORT'), 5432, 1, 65535, 'DB_PORT', TAG),
    database: url?.database ?? readEnv('DB_NAME') ?? 'feedback_db',
    user: url?.user ?? readEnv('DB_USER') ?? 'feedback_user',
    password: url?.password ?? readEnv('DB_PASSWORD') ?? '',
    ssl: parseChoice(readEnv('DB_SSL'), SSL_MODES, 'disable', 'DB_SSL', TAG),
    pool: {
      min: Math.min(min, max),
      max,
      idleTimeoutMillis: parseInteger(
        readEnv('DB_POOL_IDLE_TIMEOUT'),
        defaults.idleTimeoutMillis,
        1000,
        3600000,
        'DB_POOL_IDLE_TIMEOUT',
        TAG
      ),
      connectionTimeoutMillis: parseInteger(
        readEnv('DB_POOL_CONNECTION_TIMEOUT'),
        defaults.connectionTimeoutMillis,
        1000,
        60000,
        'DB_POOL_CONNECTION_TIMEOUT',
        TAG
      ),
    },
    queryTimeout: parseInteger(readEnv('DB_QUERY_TIMEOUT'), 30000, 1000, 300000, 'DB_QUERY_TIMEOUT', TAG),
    statementTimeout: parseInteger(
      readEnv('DB_STATEMENT_TIMEOUT'),
      60000,
      1000,
      600000,
      'DB_STATEMENT_TIMEOUT',
      TAG
    ),
    applicationName: 'feedback-workflow',
    environment,
    enableLogging: parseBoolean(readEnv('SQL_LOGGING'), environment === 'development', 'SQL_LOGGING', TAG),
  };

  if (!config.password) {
    console.warn(`[${TAG}] Database password is not set`);
  }

  console.log(`[${TAG}] Database configuration loaded:`, {
    connection: getConnectionString(config),
    ssl: config.ssl,
    pool: config.pool,
    queryTimeout: config.queryTimeout,
    statementTimeout: config.statementTimeout,
    environment: config.environment,
    enableLogging: config.enableLogging,
  });

  return config;
}

/**
 * Convert DatabaseConfig to pg PoolConfig
 */
export function toPgPoolConfig(config: DatabaseConfig): PoolConfig {
  const poolConfig: PoolConfig = {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    min: config.pool.min,
    max: config.pool.max,
    idleTimeoutMillis: config.pool.idleTimeoutMillis,
    connectionTimeoutMillis: config.pool.connectionTimeoutMillis,
    application_name: config.applicationName,
    query_timeout: config.queryTimeout,
    statement_timeout: config.statementTimeout,
  };

  if (config.ssl === 'require') {
    poolConfig.ssl = { rejectUnauthorized: false };
  } else if (config.ssl === 'verify-full') {
    poolConfig.ssl = { rejectUnauthorized: true };
  } else if (config.ssl === 'prefer') {
    poolConfig.ssl = true;
  }

  return poolConfig;
}

/**
 * Validate database configuration
 *
 * @returns Validation errors, empty when valid
 */
export function validateConfig(config: DatabaseConfig): string[] {
  const errors: string[] = [];

  if (config.host.length === 0) {
    errors.push('Database host is required');
  }

  if (config.database.length === 0) {
    errors.push('Database name is required');
  }

  if (config.user.length === 0) {
    errors.push('Database user is required');
  }

  if (config.environment === 'production' && !config.password) {
    errors.push('Database password is required in production');
  }

  if (config.pool.max < config.pool.min) {
    errors.push('Pool maximum must be greater than or equal to minimum');
  }

  return errors;
}

/**
 * Connection string with the password masked, for logs
 */
export function getConnectionString(config: DatabaseConfig): string {
  const maskedPassword = config.password ? '***' : '';
  return `postgresql://${config.user}:${maskedPassword}@${config.host}:${config.port}/${config.database}`;
}

let databaseConfigInstance: DatabaseConfig | null = null;

/**
 * Get database configuration singleton
 *
 * @throws Error if configuration is invalid
 */
export function getDatabaseConfig(): DatabaseConfig {
  if (!databaseConfigInstance) {
    const config = loadDatabaseConfig();
    const errors = validateConfig(config);

    if (errors.length > 0) {
      throw new Error(`[${TAG}] Invalid database configuration:\n${errors.join('\n')}`);
    }

    databaseConfigInstance = config;
  }

  return databaseConfigInstance;
}

/**
 * Reset database configuration singleton (for testing)
 *
 * @internal
 */
export function resetDatabaseConfig(): void {
  databaseConfigInstance = null;
}
