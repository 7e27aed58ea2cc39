/**
 * Central type definitions for the feedback workflow service
 *
 * Core interfaces, enums and result shapes shared by every module: user roles,
 * directory entries, the service result envelope and the API error body.
 *
 * @module types
 */

/**
 * User role enumeration
 *
 * Roles carried in employee access tokens and used for route authorization.
 */
export enum UserRole {
  /**
   * HR Administrator - manages review cycles and can trigger the deadline sweep
   */
  HRAdmin = 'HR_ADMIN',

  /**
   * Manager - approves or rejects nominations raised by direct reports
   */
  Manager = 'MANAGER',

  /**
   * Employee - nominates reviewers and answers feedback requests
   */
  Employee = 'EMPLOYEE',
}

/**
 * Base entity interface with common fields
 */
export interface BaseEntity {
  /**
   * Unique identifier for the entity
   */
  readonly id: string;

  /**
   * Timestamp when the entity was created
   */
  readonly createdAt: Date;
}

/**
 * Directory entry
 *
 * Read-only view of an employee as exposed by the organisation directory.
 * The workflow engine never writes to the directory.
 */
export interface DirectoryEntry {
  /**
   * User identifier
   */
  readonly id: string;

  /**
   * Work email address
   */
  readonly email: string;

  /**
   * First name
   */
  readonly firstName: string;

  /**
   * Last name
   */
  readonly lastName: string;

  /**
   * Team or vertical the user belongs to
   */
  readonly vertical: string | null;

  /**
   * Job title, used to derive the management level
   */
  readonly designation: string | null;

  /**
   * Direct manager identifier
   */
  readonly managerId: string | null;

  /**
   * Direct manager email address
   */
  readonly managerEmail: string | null;

  /**
   * Role used for authorization
   */
  readonly role: UserRole;

  /**
   * Whether the user is active
   */
  readonly isActive: boolean;
}

/**
 * Service operation result
 *
 * Envelope returned by every public service method. Failures carry the error
 * code from the workflow error taxonomy and optional structured details.
 */
export interface ServiceOperationResult<T> {
  /**
   * Whether operation was successful
   */
  readonly success: boolean;

  /**
   * Result data (if successful)
   */
  readonly data?: T;

  /**
   * Error message (if failed)
   */
  readonly error?: string;

  /**
   * Error code (if failed)
   */
  readonly errorCode?: string;

  /**
   * Structured error details, e.g. remaining quota slots
   */
  readonly details?: Record<string, unknown>;

  /**
   * Operation execution time in milliseconds
   */
  readonly executionTimeMs: number;
}

/**
 * API error response
 */
export interface ApiErrorResponse {
  /**
   * Always false for error bodies
   */
  success: false;

  /**
   * Error code for programmatic handling
   */
  code: string;

  /**
   * Human-readable error message
   */
  message: string;

  /**
   * Additional error details
   */
  details?: Record<string, unknown>;

  /**
   * Timestamp when error occurred
   */
  timestamp: string;
}

/**
 * Type guard to check if a value is a valid UserRole
 */
export function isUserRole(value: unknown): value is UserRole {
  return (
    typeof value === 'string' &&
    Object.values<string>(UserRole).includes(value)
  );
}

/**
 * Management level by designation keyword, highest first.
 */
const DESIGNATION_LEVELS: ReadonlyArray<readonly [string, number]> = [
  ['founder', 5],
  ['associate director', 4],
  ['director', 3],
  ['manager', 2],
  ['lead', 1],
];

/**
 * Derive a numeric management level from a free-text designation
 *
 * Founder 5, associate director 4, director 3, (senior) manager 2, lead 1,
 * anything else 0.
 */
export function getDesignationLevel(designation: string | null | undefined): number {
  if (!designation) {
    return 0;
  }

  const normalized = designation.trim().toLowerCase();

  for (const [keyword, level] of DESIGNATION_LEVELS) {
    if (normalized.includes(keyword)) {
      return level;
    }
  }

  return 0;
}
