/**
 * Test fixtures for directory entries, cycles and request rows
 *
 * @module tests/helpers/fixtures
 */

import { type CycleRecord, type FeedbackRequestRecord } from '../../src/db/records.js';
import { type Cycle } from '../../src/types/cycle.js';
import { UserRole, type DirectoryEntry } from '../../src/types/index.js';

export const CREATED_AT = new Date('2026-03-02T09:00:00.000Z');

export function makeEntry(overrides: Partial<DirectoryEntry> & Pick<DirectoryEntry, 'id'>): DirectoryEntry {
  return {
    email: `${overrides.id}@example.com`,
    firstName: 'Test',
    lastName: overrides.id,
    vertical: 'Engineering',
    designation: 'Engineer',
    managerId: null,
    managerEmail: null,
    role: UserRole.Employee,
    isActive: true,
    ...overrides,
  };
}

export function makeCycle(overrides: Partial<Cycle> = {}): Cycle {
  return {
    id: 'cycle-1',
    name: 'H1 2026',
    nominationStartDate: '2026-03-01',
    nominationDeadline: '2026-03-15',
    feedbackDeadline: '2026-03-31',
    isActive: true,
    createdBy: 'hr-1',
    createdAt: CREATED_AT,
    ...overrides,
  };
}

export function makeCycleRecord(overrides: Partial<CycleRecord> = {}): CycleRecord {
  return {
    id: 'cycle-1',
    name: 'H1 2026',
    nomination_start_date: '2026-03-01',
    nomination_deadline: '2026-03-15',
    feedback_deadline: '2026-03-31',
    is_active: true,
    created_by: 'hr-1',
    created_at: CREATED_AT,
    ...overrides,
  };
}

export function makeRequestRecord(overrides: Partial<FeedbackRequestRecord> = {}): FeedbackRequestRecord {
  return {
    id: 'req-1',
    cycle_id: 'cycle-1',
    requester_id: 'alice',
    reviewer_id: 'bob',
    external_email: null,
    external_name: null,
    relationship: 'PEER',
    workflow_state: 'PENDING_MANAGER_APPROVAL',
    manager_outcome: null,
    manager_actor: null,
    manager_reason: null,
    manager_decided_at: null,
    reviewer_outcome: null,
    reviewer_actor: null,
    reviewer_reason: null,
    reviewer_responded_at: null,
    counts_toward_quota: true,
    created_at: CREATED_AT,
    completed_at: null,
    ...overrides,
  };
}
