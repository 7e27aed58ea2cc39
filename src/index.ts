/**
 * Application Entry Point
 *
 * Checks the runtime and starts the HTTP server when run directly.
 *
 * @module index
 */

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { getEnvironment } from './config/env.js';
import { main as startServerMain } from './server.js';

const MIN_NODE_MAJOR = 20;

/**
 * Application metadata
 */
export const APP_METADATA = {
  name: 'feedback-workflow-service',
  version: '1.0.0',
  environment: getEnvironment(),
} as const;

/**
 * Verify the Node.js runtime meets the minimum version
 */
export function isSupportedRuntime(nodeVersion: string = process.version): boolean {
  const majorVersion = Number.parseInt(nodeVersion.replace(/^v/, '').split('.')[0] ?? '0', 10);
  return majorVersion >= MIN_NODE_MAJOR;
}

const isMainModule = process.argv[1] ? resolve(fileURLToPath(import.meta.url)) === resolve(process.argv[1]) : false;

if (isMainModule) {
  console.log('[MAIN] Feedback workflow service starting:', APP_METADATA);

  if (!isSupportedRuntime()) {
    console.error(`[MAIN] Node.js ${process.version} is not supported. Minimum required major version is ${MIN_NODE_MAJOR}`);
    process.exit(1);
  }

  startServerMain().catch((error: unknown) => {
    console.error('[MAIN] Unhandled error during startup:', error);
    process.exit(1);
  });
}
