/**
 * Database record types and row mappers
 *
 * Snake_case row shapes shared by several services, the column lists that
 * produce them, and their conversion to camelCase domain models. Date-only
 * columns are selected as text so deadlines stay calendar dates.
 *
 * @module db/records
 */

import { type QueryResultRow } from 'pg';

import { type Cycle } from '../types/cycle.js';
import {
  isRelationshipCategory,
  isWorkflowState,
  type FeedbackRequest,
  type RelationshipCategory,
  type WorkflowState,
} from '../types/feedback.js';
import { isUserRole, type DirectoryEntry, type UserRole } from '../types/index.js';

import { queryMany, type QueryOptions, type Queryable } from './index.js';

export type { Queryable };

/**
 * Run a SELECT on the given transaction client, or on the pool when none
 */
export async function selectRows<T extends QueryResultRow>(
  client: Queryable | undefined,
  sql: string,
  params: unknown[],
  options?: QueryOptions
): Promise<T[]> {
  if (client) {
    const result = await client.query<T>(sql, params);
    return result.rows;
  }
  return queryMany<T>(sql, params, options);
}

// ---------------------------------------------------------------------------
// Users

export interface UserRecord {
  readonly id: string;
  readonly email: string;
  readonly first_name: string;
  readonly last_name: string;
  readonly vertical: string | null;
  readonly designation: string | null;
  readonly manager_id: string | null;
  readonly manager_email: string | null;
  readonly role: string;
  readonly is_active: boolean;
}

/**
 * Columns for UserRecord; expects `users u LEFT JOIN users m ON m.id = u.manager_id`
 */
export const USER_COLUMNS = `u.id, u.email, u.first_name, u.last_name, u.vertical, u.designation,
  u.manager_id, m.email AS manager_email, u.role, u.is_active`;

export const USER_FROM = 'users u LEFT JOIN users m ON m.id = u.manager_id';

function parseRole(value: string): UserRole {
  if (!isUserRole(value)) {
    throw new Error(`Unknown user role in database: ${value}`);
  }
  return value;
}

export function toDirectoryEntry(record: UserRecord): DirectoryEntry {
  return {
    id: record.id,
    email: record.email,
    firstName: record.first_name,
    lastName: record.last_name,
    vertical: record.vertical,
    designation: record.designation,
    managerId: record.manager_id,
    managerEmail: record.manager_email,
    role: parseRole(record.role),
    isActive: record.is_active,
  };
}

// ---------------------------------------------------------------------------
// Review cycles

export interface CycleRecord {
  readonly id: string;
  readonly name: string;
  readonly nomination_start_date: string;
  readonly nomination_deadline: string;
  readonly feedback_deadline: string;
  readonly is_active: boolean;
  readonly created_by: string | null;
  readonly created_at: Date;
}

export const CYCLE_COLUMNS = `id, name,
  nomination_start_date::text AS nomination_start_date,
  nomination_deadline::text AS nomination_deadline,
  feedback_deadline::text AS feedback_deadline,
  is_active, created_by, created_at`;

export function toCycle(record: CycleRecord): Cycle {
  return {
    id: record.id,
    name: record.name,
    nominationStartDate: record.nomination_start_date,
    nominationDeadline: record.nomination_deadline,
    feedbackDeadline: record.feedback_deadline,
    isActive: record.is_active,
    createdBy: record.created_by,
    createdAt: record.created_at,
  };
}

// ---------------------------------------------------------------------------
// Feedback requests

export interface FeedbackRequestRecord {
  readonly id: string;
  readonly cycle_id: string;
  readonly requester_id: string;
  readonly reviewer_id: string | null;
  readonly external_email: string | null;
  readonly external_name: string | null;
  readonly relationship: string;
  readonly workflow_state: string;
  readonly manager_outcome: string | null;
  readonly manager_actor: string | null;
  readonly manager_reason: string | null;
  readonly manager_decided_at: Date | null;
  readonly reviewer_outcome: string | null;
  readonly reviewer_actor: string | null;
  readonly reviewer_reason: string | null;
  readonly reviewer_responded_at: Date | null;
  readonly counts_toward_quota: boolean;
  readonly created_at: Date;
  readonly completed_at: Date | null;
}

export const REQUEST_COLUMNS = `id, cycle_id, requester_id, reviewer_id, external_email, external_name,
  relationship, workflow_state, manager_outcome, manager_actor, manager_reason, manager_decided_at,
  reviewer_outcome, reviewer_actor, reviewer_reason, reviewer_responded_at, counts_toward_quota,
  created_at, completed_at`;

export function parseWorkflowState(value: string): WorkflowState {
  if (!isWorkflowState(value)) {
    throw new Error(`Unknown workflow state in database: ${value}`);
  }
  return value;
}

export function parseRelationship(value: string): RelationshipCategory {
  if (!isRelationshipCategory(value)) {
    throw new Error(`Unknown relationship category in database: ${value}`);
  }
  return value;
}

export function toFeedbackRequest(record: FeedbackRequestRecord): FeedbackRequest {
  let reviewer: FeedbackRequest['reviewer'];

  if (record.reviewer_id !== null) {
    reviewer = { kind: 'internal', userId: record.reviewer_id };
  } else if (record.external_email !== null) {
    reviewer = {
      kind: 'external',
      email: record.external_email,
      displayName: record.external_name ?? record.external_email,
    };
  } else {
    throw new Error(`Feedback request ${record.id} has no reviewer`);
  }

  return {
    id: record.id,
    cycleId: record.cycle_id,
    requesterId: record.requester_id,
    reviewer,
    relationship: parseRelationship(record.relationship),
    state: parseWorkflowState(record.workflow_state),
    managerDecision:
      record.manager_outcome !== null && record.manager_actor !== null && record.manager_decided_at !== null
        ? {
            outcome: record.manager_outcome,
            actor: record.manager_actor,
            reason: record.manager_reason,
            decidedAt: record.manager_decided_at,
          }
        : null,
    reviewerResponse:
      record.reviewer_outcome !== null && record.reviewer_actor !== null && record.reviewer_responded_at !== null
        ? {
            outcome: record.reviewer_outcome,
            actor: record.reviewer_actor,
            reason: record.reviewer_reason,
            decidedAt: record.reviewer_responded_at,
          }
        : null,
    countsTowardQuota: record.counts_toward_quota,
    createdAt: record.created_at,
    completedAt: record.completed_at,
  };
}
