/**
 * Nomination Service Module
 *
 * The nomination ledger. Answers how many slots a requester has used in a
 * cycle, how loaded a reviewer is, and which colleagues can still be
 * nominated. The transactional primitives here are called by the workflow
 * inside its create transaction, after the identity locks are taken.
 *
 * @module services/nomination
 */

import { getWorkflowConfig } from '../config/workflow.js';
import {
  REQUEST_COLUMNS,
  parseRelationship,
  parseWorkflowState,
  selectRows,
  type FeedbackRequestRecord,
  type Queryable,
} from '../db/records.js';
import {
  COUNTED_STATES,
  WorkflowState,
  getRejectingParty,
  getStateLabel,
  normalizeEmail,
  reviewerKey,
  type NominationStatus,
  type NominationSummary,
  type RejectingParty,
  type Reviewer,
  type SelectableReviewer,
} from '../types/feedback.js';
import { WorkflowError, WorkflowErrorCode } from '../types/errors.js';
import { type ServiceOperationResult } from '../types/index.js';

import { cycleService, type CycleService } from './cycle.service.js';
import { directoryService, fullName, type DirectoryService } from './directory.service.js';
import { fail, succeed } from './result.js';

const TAG = 'NOMINATION_SERVICE';

/**
 * Request row joined with the internal reviewer's name
 */
export interface NominationRecord extends FeedbackRequestRecord {
  readonly reviewer_first_name: string | null;
  readonly reviewer_last_name: string | null;
  readonly reviewer_email: string | null;
}

const REJECTED_STATES: readonly WorkflowState[] = [
  WorkflowState.ManagerRejected,
  WorkflowState.ReviewerRejected,
];

function toSummary(record: NominationRecord): NominationSummary {
  const isExternal = record.reviewer_id === null;
  const state = parseWorkflowState(record.workflow_state);

  const reviewerName = isExternal
    ? record.external_name ?? record.external_email ?? ''
    : fullName({ firstName: record.reviewer_first_name ?? '', lastName: record.reviewer_last_name ?? '' });

  return {
    requestId: record.id,
    reviewerName,
    reviewerEmail: (isExternal ? record.external_email : record.reviewer_email) ?? '',
    isExternal,
    relationship: parseRelationship(record.relationship),
    state,
    stateLabel: getStateLabel(state),
    rejectionReason:
      state === WorkflowState.ManagerRejected
        ? record.manager_reason
        : state === WorkflowState.ReviewerRejected
          ? record.reviewer_reason
          : null,
    createdAt: record.created_at,
  };
}

/**
 * Split a requester's nominations into active and rejected, and count slots
 *
 * Expired nominations appear in neither list and hold no slot.
 */
export function summarizeNominations(
  cycleId: string,
  records: readonly NominationRecord[],
  quota: number
): NominationStatus {
  const summaries = records.map(toSummary);

  const activeNominations = summaries.filter((summary) => COUNTED_STATES.includes(summary.state));
  const rejectedNominations = summaries.filter((summary) => REJECTED_STATES.includes(summary.state));
  const countedTotal = activeNominations.length;

  return {
    cycleId,
    activeNominations,
    rejectedNominations,
    countedTotal,
    remainingSlots: Math.max(0, quota - countedTotal),
  };
}

/**
 * Advisory lock key of a requester
 */
export function requesterLockKey(requesterId: string): string {
  return `requester:${requesterId}`;
}

/**
 * Advisory lock key of a reviewer identity
 */
export function reviewerLockKey(reviewer: Reviewer): string {
  return `reviewer:${reviewerKey(reviewer)}`;
}

export class NominationService {
  constructor(
    private readonly cycles: CycleService = cycleService,
    private readonly directory: DirectoryService = directoryService
  ) {}

  /**
   * Take transaction-scoped advisory locks on every key, in sorted order
   *
   * Concurrent create transactions touching the same requester or reviewer
   * serialize here, before any count is read.
   */
  async lockIdentities(client: Queryable, keys: readonly string[]): Promise<void> {
    const ordered = [...new Set(keys)].sort();

    for (const key of ordered) {
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [key]);
    }
  }

  /**
   * Requests of a requester in a cycle that hold a quota slot
   */
  async countOutgoing(client: Queryable, requesterId: string, cycleId: string): Promise<number> {
    const rows = await selectRows<{ count: number }>(
      client,
      `SELECT COUNT(*)::int AS count
       FROM feedback_requests
       WHERE requester_id = $1 AND cycle_id = $2 AND is_active AND workflow_state = ANY($3::text[])`,
      [requesterId, cycleId, [...COUNTED_STATES]]
    );
    return rows[0]?.count ?? 0;
  }

  /**
   * Requests addressed to a reviewer identity in a cycle that count toward
   * the reviewer's capacity
   */
  async countIncoming(client: Queryable | undefined, reviewer: Reviewer, cycleId: string): Promise<number> {
    const [condition, value] =
      reviewer.kind === 'internal'
        ? ['reviewer_id = $1', reviewer.userId]
        : ['lower(external_email) = $1', normalizeEmail(reviewer.email)];

    const rows = await selectRows<{ count: number }>(
      client,
      `SELECT COUNT(*)::int AS count
       FROM feedback_requests
       WHERE ${condition} AND cycle_id = $2 AND is_active AND counts_toward_quota`,
      [value, cycleId],
      { operation: 'count_incoming' }
    );
    return rows[0]?.count ?? 0;
  }

  /**
   * Reviewer identity keys a requester has already nominated in a cycle
   */
  async nominatedKeys(client: Queryable | undefined, requesterId: string, cycleId: string): Promise<Set<string>> {
    const rows = await selectRows<{ reviewer_id: string | null; external_email: string | null }>(
      client,
      `SELECT reviewer_id, external_email
       FROM feedback_requests
       WHERE requester_id = $1 AND cycle_id = $2 AND is_active`,
      [requesterId, cycleId],
      { operation: 'nominated_keys' }
    );

    const keys = new Set<string>();
    for (const row of rows) {
      if (row.reviewer_id !== null) {
        keys.add(reviewerKey({ kind: 'internal', userId: row.reviewer_id }));
      } else if (row.external_email !== null) {
        keys.add(reviewerKey({ kind: 'external', email: row.external_email, displayName: '' }));
      }
    }
    return keys;
  }

  /**
   * Nomination status of a requester; defaults to the active cycle
   */
  async status(
    requesterId: string,
    cycleId?: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<NominationStatus>> {
    const startTime = Date.now();
    const cid = correlationId ?? `nomination_status_${Date.now()}`;

    try {
      const resolvedCycleId = cycleId ?? (await this.cycles.requireActiveCycle()).id;

      const records = await selectRows<NominationRecord>(
        undefined,
        `SELECT fr.*, r.first_name AS reviewer_first_name, r.last_name AS reviewer_last_name,
                r.email AS reviewer_email
         FROM (
           SELECT ${REQUEST_COLUMNS}
           FROM feedback_requests
           WHERE requester_id = $1 AND cycle_id = $2 AND is_active
         ) fr
         LEFT JOIN users r ON r.id = fr.reviewer_id
         ORDER BY fr.created_at`,
        [requesterId, resolvedCycleId],
        { correlationId: cid, operation: 'nomination_status' }
      );

      return succeed(
        summarizeNominations(resolvedCycleId, records, getWorkflowConfig().requesterQuota),
        startTime
      );
    } catch (error) {
      return fail(error, startTime, {
        tag: TAG,
        operation: 'Nomination status',
        correlationId: cid,
        requesterId,
      });
    }
  }

  /**
   * Incoming load of a reviewer identity in a cycle
   */
  async reviewerLoad(reviewer: Reviewer, cycleId: string, client?: Queryable): Promise<number> {
    return this.countIncoming(client, reviewer, cycleId);
  }

  /**
   * Colleagues annotated for the reviewer picker of a requester
   */
  async listSelectableReviewers(
    requesterId: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<SelectableReviewer[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `selectable_reviewers_${Date.now()}`;

    try {
      const cycle = await this.cycles.requireActiveCycle();

      const requester = await this.directory.getEntry(requesterId);
      if (!requester) {
        throw new WorkflowError(WorkflowErrorCode.NotFound, 'Requester not found', { requesterId });
      }

      const [entries, nominationRows, loadRows] = await Promise.all([
        this.directory.listActive(),
        selectRows<{ reviewer_id: string; workflow_state: string }>(
          undefined,
          `SELECT reviewer_id, workflow_state
           FROM feedback_requests
           WHERE requester_id = $1 AND cycle_id = $2 AND is_active AND reviewer_id IS NOT NULL`,
          [requesterId, cycle.id],
          { correlationId: cid, operation: 'picker_nominations' }
        ),
        selectRows<{ reviewer_id: string; load: number }>(
          undefined,
          `SELECT reviewer_id, COUNT(*)::int AS load
           FROM feedback_requests
           WHERE cycle_id = $1 AND is_active AND counts_toward_quota AND reviewer_id IS NOT NULL
           GROUP BY reviewer_id`,
          [cycle.id],
          { correlationId: cid, operation: 'reviewer_loads' }
        ),
      ]);

      const nominated = new Set<string>();
      const rejected = new Map<string, RejectingParty>();
      for (const row of nominationRows) {
        const party = getRejectingParty(parseWorkflowState(row.workflow_state));
        if (party) {
          rejected.set(row.reviewer_id, party);
        } else {
          nominated.add(row.reviewer_id);
        }
      }

      const loads = new Map(loadRows.map((row) => [row.reviewer_id, row.load]));
      const capacity = getWorkflowConfig().reviewerCapacity;

      const reviewers = entries
        .filter((entry) => entry.id !== requester.id)
        .map((entry): SelectableReviewer => {
          const currentLoad = loads.get(entry.id) ?? 0;
          const atLimit = currentLoad >= capacity;
          const alreadyNominated = nominated.has(entry.id);
          const rejectedBy = alreadyNominated ? null : rejected.get(entry.id) ?? null;
          const isManager = requester.managerId === entry.id;

          return {
            id: entry.id,
            name: fullName(entry),
            email: entry.email,
            vertical: entry.vertical,
            designation: entry.designation,
            currentLoad,
            atLimit,
            alreadyNominated,
            rejectedBy,
            isManager,
            selectable: !atLimit && !alreadyNominated && rejectedBy === null && !isManager,
          };
        });

      return succeed(reviewers, startTime);
    } catch (error) {
      return fail(error, startTime, {
        tag: TAG,
        operation: 'List selectable reviewers',
        correlationId: cid,
        requesterId,
      });
    }
  }
}

export const nominationService = new NominationService();
