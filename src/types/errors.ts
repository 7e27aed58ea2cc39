/**
 * Workflow error taxonomy
 *
 * Every domain failure raised by the workflow services is a WorkflowError
 * carrying one of the codes below. Services throw inside transactions so the
 * transaction rolls back, then convert the error into a failed
 * ServiceOperationResult at their public boundary.
 *
 * @module types/errors
 */

/**
 * Workflow error codes
 */
export enum WorkflowErrorCode {
  NoActiveCycle = 'NO_ACTIVE_CYCLE',
  NominationClosed = 'NOMINATION_CLOSED',
  QuotaExceeded = 'QUOTA_EXCEEDED',
  ReviewerAtCapacity = 'REVIEWER_AT_CAPACITY',
  DuplicateNomination = 'DUPLICATE_NOMINATION',
  SelfManagerNomination = 'SELF_MANAGER_NOMINATION',
  ExternalNotPermitted = 'EXTERNAL_NOT_PERMITTED',
  Unauthorized = 'UNAUTHORIZED',
  InvalidTransition = 'INVALID_TRANSITION',
  InvalidToken = 'INVALID_TOKEN',
  IncompleteAnswers = 'INCOMPLETE_ANSWERS',
  NotFound = 'NOT_FOUND',
  ValidationError = 'VALIDATION_ERROR',
  InternalError = 'INTERNAL_ERROR',
}

/**
 * HTTP status for each error code
 */
export const WORKFLOW_ERROR_STATUS: Readonly<Record<WorkflowErrorCode, number>> = {
  [WorkflowErrorCode.NoActiveCycle]: 409,
  [WorkflowErrorCode.NominationClosed]: 409,
  [WorkflowErrorCode.QuotaExceeded]: 409,
  [WorkflowErrorCode.ReviewerAtCapacity]: 409,
  [WorkflowErrorCode.DuplicateNomination]: 409,
  [WorkflowErrorCode.SelfManagerNomination]: 422,
  [WorkflowErrorCode.ExternalNotPermitted]: 403,
  [WorkflowErrorCode.Unauthorized]: 403,
  [WorkflowErrorCode.InvalidTransition]: 409,
  [WorkflowErrorCode.InvalidToken]: 401,
  [WorkflowErrorCode.IncompleteAnswers]: 422,
  [WorkflowErrorCode.NotFound]: 404,
  [WorkflowErrorCode.ValidationError]: 400,
  [WorkflowErrorCode.InternalError]: 500,
};

/**
 * Workflow Error
 *
 * Structured domain error with a taxonomy code, HTTP status and details.
 */
export class WorkflowError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: WorkflowErrorCode;

  /**
   * HTTP status code for the error
   */
  public readonly statusCode: number;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: WorkflowErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WorkflowError';
    this.code = code;
    this.statusCode = WORKFLOW_ERROR_STATUS[code];
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorkflowError);
    }
  }
}

/**
 * Type guard for WorkflowError
 */
export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

/**
 * Type guard for WorkflowErrorCode values
 */
export function isWorkflowErrorCode(value: unknown): value is WorkflowErrorCode {
  return (
    typeof value === 'string' &&
    Object.values<string>(WorkflowErrorCode).includes(value)
  );
}

/**
 * Resolve the HTTP status for an arbitrary service error code
 */
export function statusForErrorCode(code: string | undefined): number {
  return isWorkflowErrorCode(code) ? WORKFLOW_ERROR_STATUS[code] : 500;
}
