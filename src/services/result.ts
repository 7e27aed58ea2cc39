/**
 * Service result helpers
 *
 * Build the ServiceOperationResult envelope returned by every public service
 * method. WorkflowErrors keep their code and details; anything else is an
 * INTERNAL_ERROR with a generic message, its detail only logged.
 *
 * @module services/result
 */

import { WorkflowErrorCode, isWorkflowError } from '../types/errors.js';
import { type ServiceOperationResult } from '../types/index.js';

const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

/**
 * Logging context of a failed operation
 */
export interface FailureContext {
  readonly tag: string;
  readonly operation: string;
  readonly correlationId: string;
  readonly [key: string]: unknown;
}

export function succeed<T>(data: T, startTime: number): ServiceOperationResult<T> {
  return {
    success: true,
    data,
    executionTimeMs: Date.now() - startTime,
  };
}

export function fail<T>(error: unknown, startTime: number, context: FailureContext): ServiceOperationResult<T> {
  const executionTimeMs = Date.now() - startTime;
  const { tag, operation, ...rest } = context;

  if (isWorkflowError(error)) {
    console.warn(`[${tag}] ${operation} rejected:`, {
      ...rest,
      errorCode: error.code,
      error: error.message,
      details: error.details,
      executionTimeMs,
      timestamp: new Date().toISOString(),
    });

    return {
      success: false,
      error: error.message,
      errorCode: error.code,
      details: error.details,
      executionTimeMs,
    };
  }

  const errorMessage = error instanceof Error ? error.message : String(error);

  console.error(`[${tag}] ${operation} failed:`, {
    ...rest,
    error: errorMessage,
    executionTimeMs,
    timestamp: new Date().toISOString(),
  });

  // Driver and SQL text stay in the log.
  return {
    success: false,
    error: INTERNAL_ERROR_MESSAGE,
    errorCode: WorkflowErrorCode.InternalError,
    executionTimeMs,
  };
}
