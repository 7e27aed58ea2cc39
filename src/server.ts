/**
 * HTTP Server Module
 *
 * Starts the HTTP server with graceful shutdown, database initialization and
 * the deadline sweeper timer.
 *
 * Startup:
 * 1. Signal handlers
 * 2. Database pool and health check, retried with backoff
 * 3. HTTP listener
 * 4. Sweeper timer when SWEEP_INTERVAL_MS > 0
 *
 * @module server
 */

import { type Server } from 'http';

import { createApp } from './app.js';
import { getEnvironment, parseBoolean, parseInteger, readEnv } from './config/env.js';
import { getWorkflowConfig } from './config/workflow.js';
import { initializePool, testConnection, shutdown as shutdownDatabase } from './db/index.js';
import { deadlineSweeperService } from './services/deadline-sweeper.service.js';
import { getEmailService, resetEmailService } from './services/email.service.js';

const TAG = 'SERVER';

/**
 * Server configuration from environment variables
 */
const ENV = {
  NODE_ENV: getEnvironment(),
  PORT: parseInteger(readEnv('PORT'), 3000, 1, 65535, 'PORT', TAG),
  HOST: readEnv('HOST') ?? '0.0.0.0',
  SHUTDOWN_TIMEOUT: parseInteger(readEnv('SHUTDOWN_TIMEOUT'), 30000, 1000, 300000, 'SHUTDOWN_TIMEOUT', TAG),
  DB_CONNECTION_TIMEOUT: parseInteger(
    readEnv('DB_CONNECTION_TIMEOUT'),
    10000,
    1000,
    120000,
    'DB_CONNECTION_TIMEOUT',
    TAG
  ),
  ENABLE_DATABASE: parseBoolean(readEnv('ENABLE_DATABASE'), true, 'ENABLE_DATABASE', TAG),
} as const;

let serverInstance: Server | null = null;
let isShuttingDown = false;

/**
 * Initialize the pool and verify connectivity, retrying with exponential backoff
 */
export async function initializeDatabase(): Promise<boolean> {
  if (!ENV.ENABLE_DATABASE) {
    console.log(`[${TAG}] Database connection disabled (ENABLE_DATABASE=false)`);
    return true;
  }

  console.log(`[${TAG}] Initializing database connection...`);

  const maxRetries = 3;
  const baseDelay = 1000;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      initializePool();

      let timer: NodeJS.Timeout | undefined;
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Database connection timeout')), ENV.DB_CONNECTION_TIMEOUT);
      });

      const healthCheck = await Promise.race([testConnection(), timeoutPromise]).finally(() => clearTimeout(timer));

      if (!healthCheck.healthy) {
        throw new Error(`Database health check failed: ${healthCheck.error ?? 'unknown error'}`);
      }

      console.log(`[${TAG}] Database connection established successfully:`, {
        latencyMs: healthCheck.latencyMs,
        poolStats: healthCheck.poolStats,
        timestamp: new Date().toISOString(),
      });

      return true;
    } catch (error) {
      console.error(`[${TAG}] Database connection attempt ${attempt}/${maxRetries} failed:`, {
        error: error instanceof Error ? error.message : String(error),
        attempt,
        timestamp: new Date().toISOString(),
      });

      if (attempt < maxRetries) {
        const delay = baseDelay * Math.pow(2, attempt - 1);
        console.log(`[${TAG}] Retrying database connection in ${delay}ms...`);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  console.error(`[${TAG}] FATAL: Failed to establish database connection after all retries`);
  return false;
}

/**
 * Bind the Express application to the configured host and port
 */
export async function startServer(): Promise<Server> {
  const app = createApp();

  return new Promise((resolve, reject) => {
    console.log(`[${TAG}] Starting HTTP server...`, {
      host: ENV.HOST,
      port: ENV.PORT,
      environment: ENV.NODE_ENV,
      timestamp: new Date().toISOString(),
    });

    const server = app.listen(ENV.PORT, ENV.HOST, () => {
      console.log(`[${TAG}] HTTP server started successfully:`, {
        host: ENV.HOST,
        port: ENV.PORT,
        environment: ENV.NODE_ENV,
        processId: process.pid,
        nodeVersion: process.version,
        timestamp: new Date().toISOString(),
      });
      resolve(server);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      console.error(`[${TAG}] FATAL: Server error:`, {
        error: error.message,
        code: error.code,
        port: ENV.PORT,
        timestamp: new Date().toISOString(),
      });

      if (error.code === 'EADDRINUSE') {
        reject(new Error(`Port ${ENV.PORT} is already in use`));
      } else {
        reject(error);
      }
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * Stop the sweeper, the HTTP listener and the database pool, then exit
 */
export async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.warn(`[${TAG}] Shutdown already in progress, ignoring signal:`, signal);
    return;
  }

  isShuttingDown = true;

  console.log(`[${TAG}] Received shutdown signal:`, {
    signal,
    timestamp: new Date().toISOString(),
  });

  const shutdownTimeout = setTimeout(() => {
    console.error(`[${TAG}] FATAL: Shutdown timeout exceeded, forcing exit`);
    process.exit(1);
  }, ENV.SHUTDOWN_TIMEOUT);

  try {
    deadlineSweeperService.stop();

    if (serverInstance) {
      console.log(`[${TAG}] Closing HTTP server...`);
      await closeServer(serverInstance);
      console.log(`[${TAG}] HTTP server closed successfully`);
    }

    if (ENV.ENABLE_DATABASE) {
      console.log(`[${TAG}] Closing database connections...`);
      await shutdownDatabase({ timeout: Math.max(1000, ENV.SHUTDOWN_TIMEOUT - 5000), force: false });
    }

    resetEmailService();

    clearTimeout(shutdownTimeout);
    console.log(`[${TAG}] Graceful shutdown completed successfully`);
    process.exit(0);
  } catch (error) {
    console.error(`[${TAG}] FATAL: Error during graceful shutdown:`, {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

function setupSignalHandlers(): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });

  process.on('uncaughtException', (error: Error) => {
    console.error(`[${TAG}] FATAL: Uncaught exception:`, {
      error: error.message,
      stack: error.stack,
      timestamp: new Date().toISOString(),
    });
    void gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    console.error(`[${TAG}] FATAL: Unhandled promise rejection:`, {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
      timestamp: new Date().toISOString(),
    });
    void gracefulShutdown('unhandledRejection');
  });
}

/**
 * Full startup sequence
 */
export async function main(): Promise<void> {
  console.log(`[${TAG}] Starting feedback workflow service:`, {
    nodeEnv: ENV.NODE_ENV,
    nodeVersion: process.version,
    processId: process.pid,
    timestamp: new Date().toISOString(),
  });

  try {
    setupSignalHandlers();

    if (!(await initializeDatabase())) {
      throw new Error('Failed to initialize database connection');
    }

    const mailer = getEmailService();
    if (mailer.isEnabled() && !(await mailer.verifyConnection())) {
      console.warn(`[${TAG}] SMTP relay unreachable at startup, notifications will fail until it recovers`);
    }

    serverInstance = await startServer();

    const { sweepIntervalMs } = getWorkflowConfig();
    if (sweepIntervalMs > 0) {
      deadlineSweeperService.start(sweepIntervalMs);
    } else {
      console.log(`[${TAG}] Deadline sweeper timer disabled (SWEEP_INTERVAL_MS=0)`);
    }

    console.log(`[${TAG}] Server is ready to accept connections:`, {
      url: `http://${ENV.HOST === '0.0.0.0' ? 'localhost' : ENV.HOST}:${ENV.PORT}`,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    console.error(`[${TAG}] FATAL: Server initialization failed:`, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      timestamp: new Date().toISOString(),
    });

    if (ENV.ENABLE_DATABASE) {
      await shutdownDatabase({ timeout: 5000, force: true }).catch((cleanupError: unknown) => {
        console.error(`[${TAG}] Error during cleanup:`, {
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
    }

    process.exit(1);
  }
}
