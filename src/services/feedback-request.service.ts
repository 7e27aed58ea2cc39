/**
 * Feedback Request Service Module
 *
 * The workflow state machine. Creates nominations, records manager decisions
 * and reviewer responses, keeps drafts and stores completed feedback. Every
 * transition locks the request row, re-checks its state against the
 * transition table and updates it with the expected state in the WHERE
 * clause. Notifications are sent after the transaction commits.
 *
 * @module services/feedback-request
 */

import { getWorkflowConfig } from '../config/workflow.js';
import { executeTransaction } from '../db/index.js';
import {
  REQUEST_COLUMNS,
  parseRelationship,
  parseWorkflowState,
  selectRows,
  toFeedbackRequest,
  type FeedbackRequestRecord,
  type Queryable,
} from '../db/records.js';
import { AccessTokenStatus } from '../types/auth.js';
import { type Cycle } from '../types/cycle.js';
import { WorkflowError, WorkflowErrorCode } from '../types/errors.js';
import {
  PENDING_STATES,
  SYSTEM_ACTOR,
  WorkflowState,
  assertTransition,
  deriveRelationship,
  getRelationshipLabel,
  getStateLabel,
  normalizeEmail,
  reviewerKey,
  type FeedbackRequest,
  type ManagerDecision,
  type PendingApproval,
  type PendingReview,
  type RelationshipCategory,
  type ResolvedReviewer,
  type Reviewer,
  type ReviewerActor,
  type ReviewerResponse,
} from '../types/feedback.js';
import { UserRole, getDesignationLevel, type DirectoryEntry, type ServiceOperationResult } from '../types/index.js';
import {
  NotificationEventType,
  type NotificationDispatcher,
  type NotificationEvent,
} from '../types/notification.js';
import {
  QuestionType,
  isQuestionType,
  type Answer,
  type DraftAnswer,
  type FeedbackForm,
  type ReceivedAnswer,
  type ReceivedFeedback,
} from '../types/question.js';
import { today } from '../utils/date.js';

import { accessTokenService, type AccessTokenService } from './access-token.service.js';
import { cycleService, isNominationOpen, type CycleService } from './cycle.service.js';
import { directoryService, fullName, type DirectoryService } from './directory.service.js';
import {
  nominationService,
  requesterLockKey,
  reviewerLockKey,
  type NominationService,
} from './nomination.service.js';
import { dispatchAll, getNotificationDispatcher } from './notification.service.js';
import { assertDraftAnswers, questionService, validateAnswers, type QuestionService } from './question.service.js';
import { fail, succeed } from './result.js';

const TAG = 'FEEDBACK_SERVICE';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Columns a transition may set from parameters
 */
type RequestColumn =
  | 'manager_outcome'
  | 'manager_actor'
  | 'manager_reason'
  | 'reviewer_outcome'
  | 'reviewer_actor'
  | 'reviewer_reason'
  | 'counts_toward_quota';

/**
 * Timestamp columns a transition may stamp with now()
 */
type StampColumn = 'manager_decided_at' | 'reviewer_responded_at' | 'completed_at';

interface TransitionChanges {
  readonly values?: Partial<Record<RequestColumn, string | boolean | null>>;
  readonly stamps?: readonly StampColumn[];
}

/**
 * People and cycle a request's notifications talk about
 */
interface RequestParties {
  readonly cycle: Cycle;
  readonly requester: DirectoryEntry;
  readonly reviewerName: string;
  readonly reviewerEmail: string;
}

/**
 * Outcome of a transition made inside someone else's transaction
 */
export interface TransitionOutcome {
  readonly request: FeedbackRequest;
  readonly events: readonly NotificationEvent[];
}

/**
 * Row of a completed answer joined with its request and question
 */
export interface ReceivedAnswerRecord {
  readonly request_id: string;
  readonly relationship: string;
  readonly completed_at: Date;
  readonly question_text: string;
  readonly question_type: string;
  readonly rating_value: number | null;
  readonly response_value: string | null;
}

interface DraftRecord {
  readonly question_id: string;
  readonly rating_value: number | null;
  readonly response_value: string | null;
  readonly saved_at: Date;
}

/**
 * Collaborators, replaceable in tests
 */
export interface FeedbackRequestServiceDeps {
  readonly cycles?: CycleService;
  readonly directory?: DirectoryService;
  readonly nominations?: NominationService;
  readonly questions?: QuestionService;
  readonly tokens?: AccessTokenService;
  readonly dispatcher?: NotificationDispatcher;
}

/**
 * Check a nomination batch before any database work
 *
 * @returns The batch with emails normalized and names trimmed
 * @throws WorkflowError VALIDATION_ERROR or DUPLICATE_NOMINATION
 */
export function validateNominationBatch(requesterId: string, reviewers: readonly Reviewer[]): Reviewer[] {
  if (reviewers.length === 0) {
    throw new WorkflowError(WorkflowErrorCode.ValidationError, 'At least one reviewer is required');
  }

  const errors: string[] = [];
  const normalized = reviewers.map((reviewer, index): Reviewer => {
    if (reviewer.kind === 'internal') {
      if (reviewer.userId === requesterId) {
        errors.push('You cannot nominate yourself');
      }
      return reviewer;
    }

    const email = normalizeEmail(reviewer.email);
    const displayName = reviewer.displayName.trim();

    if (!EMAIL_PATTERN.test(email)) {
      errors.push(`Reviewer ${index + 1}: a valid email address is required`);
    }
    if (displayName.length === 0) {
      errors.push(`Reviewer ${index + 1}: a name is required for external reviewers`);
    }

    return { kind: 'external', email, displayName };
  });

  if (errors.length > 0) {
    throw new WorkflowError(WorkflowErrorCode.ValidationError, errors.join(', '), { errors });
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const reviewer of normalized) {
    const key = reviewerKey(reviewer);
    if (seen.has(key)) {
      duplicates.push(key);
    }
    seen.add(key);
  }

  if (duplicates.length > 0) {
    throw new WorkflowError(
      WorkflowErrorCode.DuplicateNomination,
      'The same reviewer appears more than once in this nomination',
      { duplicates }
    );
  }

  return normalized;
}

/**
 * Whether an actor is the reviewer of a request
 *
 * An external actor must match the request's email and the request its token
 * was issued for.
 */
export function isReviewerOf(record: FeedbackRequestRecord, actor: ReviewerActor): boolean {
  if (actor.kind === 'internal') {
    return record.reviewer_id !== null && record.reviewer_id === actor.userId;
  }

  return (
    record.external_email !== null &&
    normalizeEmail(record.external_email) === normalizeEmail(actor.email) &&
    actor.requestId === record.id
  );
}

function actorIdentity(actor: ReviewerActor): string {
  return actor.kind === 'internal' ? actor.userId : normalizeEmail(actor.email);
}

function requireReason(reason: string | undefined): string {
  const trimmed = reason?.trim() ?? '';
  if (trimmed.length === 0) {
    throw new WorkflowError(WorkflowErrorCode.ValidationError, 'A reason is required when rejecting');
  }
  return trimmed;
}

/**
 * Group answer rows into one entry per completed request
 *
 * Rows arrive ordered by request and question; reviewer identity is never
 * part of the output.
 */
export function groupReceivedFeedback(rows: readonly ReceivedAnswerRecord[]): ReceivedFeedback[] {
  const grouped = new Map<string, { relationship: RelationshipCategory; completedAt: Date; answers: ReceivedAnswer[] }>();

  for (const row of rows) {
    if (!isQuestionType(row.question_type)) {
      throw new Error(`Unknown question type in database: ${row.question_type}`);
    }

    let entry = grouped.get(row.request_id);
    if (!entry) {
      entry = { relationship: parseRelationship(row.relationship), completedAt: row.completed_at, answers: [] };
      grouped.set(row.request_id, entry);
    }

    entry.answers.push({
      questionText: row.question_text,
      type: row.question_type,
      rating: row.rating_value,
      text: row.response_value,
    });
  }

  return [...grouped.entries()].map(([requestId, entry]) => ({
    requestId,
    relationship: entry.relationship,
    completedAt: entry.completedAt,
    answers: entry.answers,
  }));
}

export class FeedbackRequestService {
  private readonly cycles: CycleService;
  private readonly directory: DirectoryService;
  private readonly nominations: NominationService;
  private readonly questions: QuestionService;
  private readonly tokens: AccessTokenService;
  private readonly dispatcher?: NotificationDispatcher;

  constructor(deps: FeedbackRequestServiceDeps = {}) {
    this.cycles = deps.cycles ?? cycleService;
    this.directory = deps.directory ?? directoryService;
    this.nominations = deps.nominations ?? nominationService;
    this.questions = deps.questions ?? questionService;
    this.tokens = deps.tokens ?? accessTokenService;
    this.dispatcher = deps.dispatcher;
  }

  private get notifier(): NotificationDispatcher {
    return this.dispatcher ?? getNotificationDispatcher();
  }

  /**
   * Dispatch events after commit
   *
   * @returns Number of events dispatched without error
   */
  async notify(events: readonly NotificationEvent[], correlationId?: string): Promise<number> {
    return dispatchAll(this.notifier, events, correlationId);
  }

  // -------------------------------------------------------------------------
  // Creation

  /**
   * Nominate reviewers for the active cycle
   *
   * The whole batch is created or nothing is. Requester and reviewer
   * identities are locked before the quota and capacity counts are read.
   */
  async createNominations(
    requesterId: string,
    reviewers: readonly Reviewer[],
    correlationId?: string,
    on: string = today()
  ): Promise<ServiceOperationResult<FeedbackRequest[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `create_nominations_${Date.now()}`;

    console.log(`[${TAG}] Creating nominations:`, {
      requesterId,
      reviewerCount: reviewers.length,
      externalCount: reviewers.filter((reviewer) => reviewer.kind === 'external').length,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const { created, events } = await executeTransaction(
        async (client) => {
          const cycle = await this.cycles.requireActiveCycle(client);

          if (!isNominationOpen(cycle, on)) {
            throw new WorkflowError(
              WorkflowErrorCode.NominationClosed,
              `Nominations for ${cycle.name} are open from ${cycle.nominationStartDate} to ${cycle.nominationDeadline}`,
              { cycleId: cycle.id, nominationDeadline: cycle.nominationDeadline }
            );
          }

          const batch = validateNominationBatch(requesterId, reviewers);

          await this.nominations.lockIdentities(client, [
            requesterLockKey(requesterId),
            ...batch.map(reviewerLockKey),
          ]);

          const requester = await this.directory.getEntry(requesterId, client);
          if (!requester || !requester.isActive) {
            throw new WorkflowError(WorkflowErrorCode.NotFound, 'Requester not found', { requesterId });
          }

          const externals = batch.filter((reviewer) => reviewer.kind === 'external');
          const config = getWorkflowConfig();

          if (externals.length > 0 && getDesignationLevel(requester.designation) < config.externalMinLevel) {
            throw new WorkflowError(
              WorkflowErrorCode.ExternalNotPermitted,
              'Your designation does not allow nominating external stakeholders',
              { designation: requester.designation }
            );
          }

          const resolved = await this.resolveReviewers(client, requester, batch);

          const counted = await this.nominations.countOutgoing(client, requesterId, cycle.id);
          const remainingSlots = Math.max(0, config.requesterQuota - counted);

          if (batch.length > remainingSlots) {
            throw new WorkflowError(
              WorkflowErrorCode.QuotaExceeded,
              `You can nominate ${remainingSlots} more reviewer${remainingSlots === 1 ? '' : 's'} in this cycle`,
              { remainingSlots, requested: batch.length }
            );
          }

          const nominated = await this.nominations.nominatedKeys(client, requesterId, cycle.id);
          const duplicates = batch.map(reviewerKey).filter((key) => nominated.has(key));

          if (duplicates.length > 0) {
            throw new WorkflowError(
              WorkflowErrorCode.DuplicateNomination,
              'You have already nominated this reviewer in the current cycle',
              { duplicates }
            );
          }

          const atCapacity: string[] = [];
          for (const item of resolved) {
            const load = await this.nominations.countIncoming(client, item.reviewer, cycle.id);
            if (load >= config.reviewerCapacity) {
              atCapacity.push(item.name);
            }
          }

          if (atCapacity.length > 0) {
            throw new WorkflowError(
              WorkflowErrorCode.ReviewerAtCapacity,
              `Already at the request limit for this cycle: ${atCapacity.join(', ')}`,
              { reviewers: atCapacity, capacity: config.reviewerCapacity }
            );
          }

          const requests: FeedbackRequest[] = [];
          for (const item of resolved) {
            const inserted = await client.query<FeedbackRequestRecord>(
              `INSERT INTO feedback_requests (
                cycle_id, requester_id, reviewer_id, external_email, external_name,
                relationship, workflow_state, counts_toward_quota
              ) VALUES ($1, $2, $3, $4, $5, $6, $7, TRUE)
              RETURNING ${REQUEST_COLUMNS}`,
              [
                cycle.id,
                requesterId,
                item.reviewer.kind === 'internal' ? item.reviewer.userId : null,
                item.reviewer.kind === 'external' ? item.reviewer.email : null,
                item.reviewer.kind === 'external' ? item.reviewer.displayName : null,
                item.relationship,
                WorkflowState.PendingManagerApproval,
              ]
            );

            const record = inserted.rows[0];
            if (!record) {
              throw new Error('Failed to create feedback request record');
            }
            requests.push(toFeedbackRequest(record));
          }

          const approvalEvents: NotificationEvent[] = [];
          const manager = requester.managerId ? await this.directory.getEntry(requester.managerId, client) : null;

          if (manager) {
            approvalEvents.push({
              type: NotificationEventType.ManagerApprovalRequested,
              recipientEmail: manager.email,
              managerName: fullName(manager),
              requesterName: fullName(requester),
              cycleName: cycle.name,
              nominationDeadline: cycle.nominationDeadline,
              nominees: resolved.map((item) => ({
                name: item.name,
                relationshipLabel: getRelationshipLabel(item.relationship),
                isExternal: item.reviewer.kind === 'external',
              })),
            });
          } else {
            console.warn(`[${TAG}] Requester has no manager to notify:`, {
              requesterId,
              correlationId: cid,
            });
          }

          return { created: requests, events: approvalEvents };
        },
        { correlationId: cid, operation: 'create_nominations' }
      );

      await this.notify(events, cid);

      console.log(`[${TAG}] Nominations created:`, {
        requesterId,
        requestIds: created.map((request) => request.id),
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
      });

      return succeed(created, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Nomination', correlationId: cid, requesterId });
    }
  }

  /**
   * Resolve internal reviewers and derive relationships
   *
   * Self-manager nominations are reported before unknown reviewers.
   */
  private async resolveReviewers(
    client: Queryable,
    requester: DirectoryEntry,
    batch: readonly Reviewer[]
  ): Promise<{ reviewer: Reviewer; name: string; relationship: RelationshipCategory }[]> {
    const internalIds = batch.flatMap((reviewer) => (reviewer.kind === 'internal' ? [reviewer.userId] : []));
    const entries = await this.directory.getEntries(internalIds, client);

    const missing: string[] = [];
    const resolved: { reviewer: Reviewer; name: string; relationship: RelationshipCategory }[] = [];

    for (const reviewer of batch) {
      let target: ResolvedReviewer;

      if (reviewer.kind === 'internal') {
        if (reviewer.userId === requester.managerId) {
          throw new WorkflowError(
            WorkflowErrorCode.SelfManagerNomination,
            'Your direct manager cannot be nominated as a reviewer',
            { reviewerId: reviewer.userId }
          );
        }

        const entry = entries.get(reviewer.userId);
        if (!entry || !entry.isActive) {
          missing.push(reviewer.userId);
          continue;
        }
        target = { kind: 'internal', entry };
      } else {
        target = reviewer;
      }

      resolved.push({
        reviewer,
        name: target.kind === 'internal' ? fullName(target.entry) : target.displayName,
        relationship: deriveRelationship(requester, target),
      });
    }

    if (missing.length > 0) {
      throw new WorkflowError(WorkflowErrorCode.NotFound, 'Reviewer not found', { reviewerIds: missing });
    }

    return resolved;
  }

  // -------------------------------------------------------------------------
  // Shared transition primitives

  /**
   * Lock a request row for the rest of the transaction
   */
  async lockRequest(client: Queryable, requestId: string): Promise<FeedbackRequestRecord | null> {
    const result = await client.query<FeedbackRequestRecord>(
      `SELECT ${REQUEST_COLUMNS} FROM feedback_requests WHERE id = $1 AND is_active FOR UPDATE`,
      [requestId]
    );
    return result.rows[0] ?? null;
  }

  /**
   * Read a request without locking it
   */
  async findRequest(requestId: string, correlationId?: string): Promise<FeedbackRequestRecord | null> {
    const rows = await selectRows<FeedbackRequestRecord>(
      undefined,
      `SELECT ${REQUEST_COLUMNS} FROM feedback_requests WHERE id = $1 AND is_active`,
      [requestId],
      { correlationId, operation: 'get_request' }
    );
    return rows[0] ?? null;
  }

  private async requireLockedRequest(client: Queryable, requestId: string): Promise<FeedbackRequestRecord> {
    const record = await this.lockRequest(client, requestId);
    if (!record) {
      throw new WorkflowError(WorkflowErrorCode.NotFound, 'Feedback request not found', { requestId });
    }
    return record;
  }

  /**
   * Move a locked request to a new state
   *
   * The update only applies while the row is still in the state it was read
   * in; otherwise INVALID_TRANSITION.
   */
  private async transition(
    client: Queryable,
    record: FeedbackRequestRecord,
    to: WorkflowState,
    changes: TransitionChanges
  ): Promise<FeedbackRequestRecord> {
    const from = parseWorkflowState(record.workflow_state);
    assertTransition(from, to, record.id);

    const values = Object.entries(changes.values ?? {});
    const assignments = [
      ...values.map(([column], index) => `${column} = $${index + 4}`),
      ...(changes.stamps ?? []).map((column) => `${column} = now()`),
    ];

    const result = await client.query<FeedbackRequestRecord>(
      `UPDATE feedback_requests
       SET workflow_state = $3, updated_at = now()${assignments.map((assignment) => `, ${assignment}`).join('')}
       WHERE id = $1 AND workflow_state = $2
       RETURNING ${REQUEST_COLUMNS}`,
      [record.id, from, to, ...values.map(([, value]) => value)]
    );

    const updated = result.rows[0];
    if (!updated) {
      throw new WorkflowError(
        WorkflowErrorCode.InvalidTransition,
        `Request ${record.id} is no longer in state ${from}`,
        { requestId: record.id, from, to }
      );
    }
    return updated;
  }

  private async loadParties(client: Queryable, record: FeedbackRequestRecord): Promise<RequestParties> {
    const cycle = await this.cycles.getCycle(record.cycle_id, client);
    const requester = await this.directory.getEntry(record.requester_id, client);

    if (!cycle || !requester) {
      throw new Error(`Feedback request ${record.id} refers to a missing cycle or requester`);
    }

    if (record.reviewer_id !== null) {
      const reviewer = await this.directory.getEntry(record.reviewer_id, client);
      if (!reviewer) {
        throw new Error(`Feedback request ${record.id} refers to a missing reviewer`);
      }
      return { cycle, requester, reviewerName: fullName(reviewer), reviewerEmail: reviewer.email };
    }

    const email = record.external_email ?? '';
    return { cycle, requester, reviewerName: record.external_name ?? email, reviewerEmail: email };
  }

  private approvalEvents(
    parties: RequestParties,
    record: FeedbackRequestRecord,
    token: string | null,
    automatic: boolean
  ): NotificationEvent[] {
    const { cycle, requester, reviewerName, reviewerEmail } = parties;
    const requesterName = fullName(requester);

    const approved: NotificationEvent = {
      type: NotificationEventType.NominationApproved,
      recipientEmail: requester.email,
      requesterName,
      reviewerName,
      cycleName: cycle.name,
      automatic,
    };

    const invite: NotificationEvent =
      token !== null
        ? {
            type: NotificationEventType.ExternalInviteReady,
            recipientEmail: reviewerEmail,
            reviewerName,
            requesterName,
            cycleName: cycle.name,
            feedbackDeadline: cycle.feedbackDeadline,
            requestId: record.id,
            token,
          }
        : {
            type: NotificationEventType.ReviewerInviteReady,
            recipientEmail: reviewerEmail,
            reviewerName,
            requesterName,
            relationshipLabel: getRelationshipLabel(parseRelationship(record.relationship)),
            cycleName: cycle.name,
            feedbackDeadline: cycle.feedbackDeadline,
            requestId: record.id,
          };

    return [approved, invite];
  }

  /**
   * Approve a locked request, issuing the token of an external reviewer
   */
  private async approve(
    client: Queryable,
    record: FeedbackRequestRecord,
    actor: string
  ): Promise<{ updated: FeedbackRequestRecord; token: string | null }> {
    const updated = await this.transition(client, record, WorkflowState.PendingReviewerAcceptance, {
      values: { manager_outcome: 'APPROVED', manager_actor: actor, counts_toward_quota: true },
      stamps: ['manager_decided_at'],
    });

    const token =
      updated.external_email !== null
        ? await this.tokens.issue(client, updated.external_email, updated.id, updated.cycle_id)
        : null;

    return { updated, token };
  }

  // -------------------------------------------------------------------------
  // Manager decision

  /**
   * Approve or reject a nomination as the requester's direct manager
   */
  async decideAsManager(
    requestId: string,
    managerId: string,
    decision: ManagerDecision,
    reason?: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackRequest>> {
    const startTime = Date.now();
    const cid = correlationId ?? `manager_decision_${Date.now()}`;

    console.log(`[${TAG}] Recording manager decision:`, {
      requestId,
      managerId,
      decision,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const rejectionReason = decision === 'REJECT' ? requireReason(reason) : null;

      const { request, events } = await executeTransaction(
        async (client) => {
          const record = await this.requireLockedRequest(client, requestId);

          const requester = await this.directory.getEntry(record.requester_id, client);
          if (!requester || requester.managerId !== managerId) {
            throw new WorkflowError(
              WorkflowErrorCode.Unauthorized,
              "Only the requester's direct manager can decide on this nomination",
              { requestId }
            );
          }

          if (rejectionReason === null) {
            const { updated, token } = await this.approve(client, record, managerId);
            const parties = await this.loadParties(client, updated);
            return {
              request: toFeedbackRequest(updated),
              events: this.approvalEvents(parties, updated, token, false),
            };
          }

          const updated = await this.transition(client, record, WorkflowState.ManagerRejected, {
            values: {
              manager_outcome: 'REJECTED',
              manager_actor: managerId,
              manager_reason: rejectionReason,
              counts_toward_quota: false,
            },
            stamps: ['manager_decided_at'],
          });

          const parties = await this.loadParties(client, updated);
          const rejected: NotificationEvent = {
            type: NotificationEventType.NominationRejected,
            recipientEmail: parties.requester.email,
            requesterName: fullName(parties.requester),
            reviewerName: parties.reviewerName,
            rejectedBy: 'MANAGER',
            reason: rejectionReason,
          };

          return { request: toFeedbackRequest(updated), events: [rejected] };
        },
        { correlationId: cid, operation: 'manager_decision' }
      );

      await this.notify(events, cid);

      console.log(`[${TAG}] Manager decision recorded:`, {
        requestId,
        state: request.state,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
      });

      return succeed(request, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Manager decision', correlationId: cid, requestId });
    }
  }

  // -------------------------------------------------------------------------
  // Reviewer response

  /**
   * Accept or decline a request as its reviewer
   */
  async respondAsReviewer(
    requestId: string,
    actor: ReviewerActor,
    response: ReviewerResponse,
    reason?: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackRequest>> {
    const startTime = Date.now();
    const cid = correlationId ?? `reviewer_response_${Date.now()}`;

    console.log(`[${TAG}] Recording reviewer response:`, {
      requestId,
      actorKind: actor.kind,
      response,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const declineReason = response === 'REJECT' ? requireReason(reason) : null;

      const { request, events } = await executeTransaction(
        async (client) => {
          const record = await this.requireLockedRequest(client, requestId);

          if (!isReviewerOf(record, actor)) {
            throw new WorkflowError(
              WorkflowErrorCode.Unauthorized,
              'Only the nominated reviewer can respond to this request',
              { requestId }
            );
          }

          if (declineReason === null) {
            const updated = await this.transition(client, record, WorkflowState.InProgress, {
              values: { reviewer_outcome: 'ACCEPTED', reviewer_actor: actorIdentity(actor), counts_toward_quota: true },
              stamps: ['reviewer_responded_at'],
            });
            await this.tokens.updateStatus(client, updated.id, AccessTokenStatus.Accepted, false);
            return { request: toFeedbackRequest(updated), events: [] };
          }

          const updated = await this.transition(client, record, WorkflowState.ReviewerRejected, {
            values: {
              reviewer_outcome: 'REJECTED',
              reviewer_actor: actorIdentity(actor),
              reviewer_reason: declineReason,
              counts_toward_quota: false,
            },
            stamps: ['reviewer_responded_at'],
          });
          await this.tokens.updateStatus(client, updated.id, AccessTokenStatus.Rejected, true);

          const parties = await this.loadParties(client, updated);
          const rejected: NotificationEvent = {
            type: NotificationEventType.NominationRejected,
            recipientEmail: parties.requester.email,
            requesterName: fullName(parties.requester),
            reviewerName: parties.reviewerName,
            rejectedBy: 'REVIEWER',
            reason: declineReason,
          };

          return { request: toFeedbackRequest(updated), events: [rejected] };
        },
        { correlationId: cid, operation: 'reviewer_response' }
      );

      await this.notify(events, cid);

      console.log(`[${TAG}] Reviewer response recorded:`, {
        requestId,
        state: request.state,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
      });

      return succeed(request, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Reviewer response', correlationId: cid, requestId });
    }
  }

  // -------------------------------------------------------------------------
  // Questions, drafts and completion

  private async requireReviewedRequest(
    client: Queryable | undefined,
    requestId: string,
    actor: ReviewerActor
  ): Promise<FeedbackRequestRecord> {
    const record = client ? await this.lockRequest(client, requestId) : await this.findRequest(requestId);

    if (!record) {
      throw new WorkflowError(WorkflowErrorCode.NotFound, 'Feedback request not found', { requestId });
    }

    if (!isReviewerOf(record, actor)) {
      throw new WorkflowError(
        WorkflowErrorCode.Unauthorized,
        'Only the nominated reviewer can work on this request',
        { requestId }
      );
    }

    return record;
  }

  private async readDraft(client: Queryable | undefined, requestId: string): Promise<DraftAnswer[]> {
    const rows = await selectRows<DraftRecord>(
      client,
      `SELECT question_id, rating_value, response_value, saved_at
       FROM draft_responses
       WHERE request_id = $1
       ORDER BY saved_at`,
      [requestId],
      { operation: 'get_draft' }
    );

    return rows.map((row) => ({
      questionId: row.question_id,
      rating: row.rating_value,
      text: row.response_value,
      savedAt: row.saved_at,
    }));
  }

  /**
   * Questions for the request's relationship, with any saved draft
   */
  async getQuestionsForRequest(
    requestId: string,
    actor: ReviewerActor,
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackForm>> {
    const startTime = Date.now();
    const cid = correlationId ?? `get_feedback_form_${Date.now()}`;

    try {
      const record = await this.requireReviewedRequest(undefined, requestId, actor);
      const relationship = parseRelationship(record.relationship);

      const [questions, draft] = await Promise.all([
        this.questions.getQuestions(relationship),
        this.readDraft(undefined, requestId),
      ]);

      return succeed(
        {
          requestId,
          relationship,
          state: parseWorkflowState(record.workflow_state),
          questions,
          draft,
        },
        startTime
      );
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Get feedback form', correlationId: cid, requestId });
    }
  }

  /**
   * Save partial answers while the request is in progress
   */
  async saveDraft(
    requestId: string,
    actor: ReviewerActor,
    answers: readonly Answer[],
    correlationId?: string
  ): Promise<ServiceOperationResult<{ savedCount: number }>> {
    const startTime = Date.now();
    const cid = correlationId ?? `save_draft_${Date.now()}`;

    try {
      const savedCount = await executeTransaction(
        async (client) => {
          const record = await this.requireReviewedRequest(client, requestId, actor);

          if (record.workflow_state !== WorkflowState.InProgress) {
            throw new WorkflowError(
              WorkflowErrorCode.InvalidTransition,
              'Drafts can only be saved while feedback is in progress',
              { requestId, state: record.workflow_state }
            );
          }

          const questions = await this.questions.getQuestions(parseRelationship(record.relationship), client);
          assertDraftAnswers(questions, answers);

          for (const answer of answers) {
            await client.query(
              `INSERT INTO draft_responses (request_id, question_id, rating_value, response_value, saved_at)
               VALUES ($1, $2, $3, $4, now())
               ON CONFLICT (request_id, question_id) DO UPDATE
               SET rating_value = EXCLUDED.rating_value,
                   response_value = EXCLUDED.response_value,
                   saved_at = EXCLUDED.saved_at`,
              [requestId, answer.questionId, answer.rating ?? null, answer.text ?? null]
            );
          }

          return answers.length;
        },
        { correlationId: cid, operation: 'save_draft' }
      );

      return succeed({ savedCount }, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Save draft', correlationId: cid, requestId });
    }
  }

  /**
   * Saved draft answers of a request
   */
  async getDraft(
    requestId: string,
    actor: ReviewerActor,
    correlationId?: string
  ): Promise<ServiceOperationResult<DraftAnswer[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `get_draft_${Date.now()}`;

    try {
      await this.requireReviewedRequest(undefined, requestId, actor);
      return succeed(await this.readDraft(undefined, requestId), startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Get draft', correlationId: cid, requestId });
    }
  }

  /**
   * Submit final answers and complete the request
   *
   * External reviewers must answer every text question.
   */
  async completeFeedback(
    requestId: string,
    actor: ReviewerActor,
    answers: readonly Answer[],
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackRequest>> {
    const startTime = Date.now();
    const cid = correlationId ?? `complete_feedback_${Date.now()}`;

    console.log(`[${TAG}] Completing feedback:`, {
      requestId,
      actorKind: actor.kind,
      answerCount: answers.length,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const { request, events } = await executeTransaction(
        async (client) => {
          const record = await this.requireReviewedRequest(client, requestId, actor);
          const state = parseWorkflowState(record.workflow_state);

          if (state !== WorkflowState.InProgress) {
            assertTransition(state, WorkflowState.Completed, requestId);
          }

          const questions = await this.questions.getQuestions(parseRelationship(record.relationship), client);
          const validation = validateAnswers(questions, answers, { requireAllText: actor.kind === 'external' });

          if (validation.unknownQuestionIds.length > 0) {
            throw new WorkflowError(
              WorkflowErrorCode.ValidationError,
              'Answers refer to questions that are not part of this feedback form',
              { unknownQuestionIds: validation.unknownQuestionIds }
            );
          }

          if (validation.missingQuestionIds.length > 0) {
            throw new WorkflowError(
              WorkflowErrorCode.IncompleteAnswers,
              'Some questions still need an answer',
              { missingQuestionIds: validation.missingQuestionIds }
            );
          }

          const byQuestion = new Map(answers.map((answer) => [answer.questionId, answer]));

          for (const question of questions) {
            const answer = byQuestion.get(question.id);
            if (!answer) {
              continue;
            }

            const text = answer.text?.trim() ?? '';
            await client.query(
              `INSERT INTO feedback_responses (request_id, question_id, rating_value, response_value)
               VALUES ($1, $2, $3, $4)`,
              [
                requestId,
                question.id,
                question.type === QuestionType.Rating ? answer.rating ?? null : null,
                question.type === QuestionType.Text && text.length > 0 ? text : null,
              ]
            );
          }

          await client.query('DELETE FROM draft_responses WHERE request_id = $1', [requestId]);

          const updated = await this.transition(client, record, WorkflowState.Completed, {
            stamps: ['completed_at'],
          });
          await this.tokens.updateStatus(client, requestId, AccessTokenStatus.Completed, true);

          const parties = await this.loadParties(client, updated);
          const completed: NotificationEvent = {
            type: NotificationEventType.FeedbackCompleted,
            recipientEmail: parties.requester.email,
            requesterName: fullName(parties.requester),
            relationshipLabel: getRelationshipLabel(parseRelationship(updated.relationship)),
            cycleName: parties.cycle.name,
          };

          return { request: toFeedbackRequest(updated), events: [completed] };
        },
        { correlationId: cid, operation: 'complete_feedback' }
      );

      await this.notify(events, cid);

      console.log(`[${TAG}] Feedback completed:`, {
        requestId,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
      });

      return succeed(request, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Feedback completion', correlationId: cid, requestId });
    }
  }

  // -------------------------------------------------------------------------
  // Deadline transitions, run inside the sweeper's per-row transaction

  /**
   * Approve a pending nomination on behalf of the system
   *
   * @returns null when the request is no longer awaiting its manager
   */
  async autoApprove(client: Queryable, requestId: string): Promise<TransitionOutcome | null> {
    const record = await this.lockRequest(client, requestId);
    if (!record || record.workflow_state !== WorkflowState.PendingManagerApproval) {
      return null;
    }

    const { updated, token } = await this.approve(client, record, SYSTEM_ACTOR);
    const parties = await this.loadParties(client, updated);

    return {
      request: toFeedbackRequest(updated),
      events: this.approvalEvents(parties, updated, token, true),
    };
  }

  /**
   * Accept a manager-approved invitation on behalf of the system
   *
   * Requests the system approved itself are left for their reviewer.
   *
   * @returns null when there is nothing to accept
   */
  async autoAccept(client: Queryable, requestId: string): Promise<TransitionOutcome | null> {
    const record = await this.lockRequest(client, requestId);
    if (
      !record ||
      record.workflow_state !== WorkflowState.PendingReviewerAcceptance ||
      record.manager_actor === SYSTEM_ACTOR
    ) {
      return null;
    }

    const updated = await this.transition(client, record, WorkflowState.InProgress, {
      values: { reviewer_outcome: 'ACCEPTED', reviewer_actor: SYSTEM_ACTOR, counts_toward_quota: true },
      stamps: ['reviewer_responded_at'],
    });
    await this.tokens.updateStatus(client, requestId, AccessTokenStatus.Accepted, false);

    return { request: toFeedbackRequest(updated), events: [] };
  }

  /**
   * Expire a request still waiting for its manager or reviewer
   *
   * @returns null when the request is no longer pending
   */
  async expire(client: Queryable, requestId: string): Promise<TransitionOutcome | null> {
    const record = await this.lockRequest(client, requestId);
    if (!record) {
      return null;
    }

    const state = parseWorkflowState(record.workflow_state);
    if (!PENDING_STATES.includes(state)) {
      return null;
    }

    const changes: TransitionChanges =
      state === WorkflowState.PendingManagerApproval
        ? {
            values: { manager_outcome: 'EXPIRED', manager_actor: SYSTEM_ACTOR, counts_toward_quota: false },
            stamps: ['manager_decided_at'],
          }
        : {
            values: { reviewer_outcome: 'EXPIRED', reviewer_actor: SYSTEM_ACTOR, counts_toward_quota: false },
            stamps: ['reviewer_responded_at'],
          };

    const updated = await this.transition(client, record, WorkflowState.Expired, changes);
    await this.tokens.updateStatus(client, requestId, AccessTokenStatus.Expired, true);

    return { request: toFeedbackRequest(updated), events: [] };
  }

  // -------------------------------------------------------------------------
  // Queries

  /**
   * Nominations waiting for a manager's decision
   */
  async getPendingApprovals(
    managerId: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<PendingApproval[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `pending_approvals_${Date.now()}`;

    try {
      const rows = await selectRows<
        FeedbackRequestRecord & {
          requester_first_name: string;
          requester_last_name: string;
          reviewer_first_name: string | null;
          reviewer_last_name: string | null;
          reviewer_email: string | null;
        }
      >(
        undefined,
        `SELECT fr.*, q.first_name AS requester_first_name, q.last_name AS requester_last_name,
                r.first_name AS reviewer_first_name, r.last_name AS reviewer_last_name, r.email AS reviewer_email
         FROM (
           SELECT ${REQUEST_COLUMNS}
           FROM feedback_requests
           WHERE workflow_state = $2 AND is_active
         ) fr
         JOIN users q ON q.id = fr.requester_id
         LEFT JOIN users r ON r.id = fr.reviewer_id
         WHERE q.manager_id = $1
         ORDER BY fr.created_at`,
        [managerId, WorkflowState.PendingManagerApproval],
        { correlationId: cid, operation: 'pending_approvals' }
      );

      const approvals = rows.map((row): PendingApproval => {
        const relationship = parseRelationship(row.relationship);
        const isExternal = row.reviewer_id === null;
        return {
          requestId: row.id,
          requesterId: row.requester_id,
          requesterName: fullName({ firstName: row.requester_first_name, lastName: row.requester_last_name }),
          reviewerName: isExternal
            ? row.external_name ?? row.external_email ?? ''
            : fullName({ firstName: row.reviewer_first_name ?? '', lastName: row.reviewer_last_name ?? '' }),
          reviewerEmail: (isExternal ? row.external_email : row.reviewer_email) ?? '',
          isExternal,
          relationship,
          relationshipLabel: getRelationshipLabel(relationship),
          createdAt: row.created_at,
        };
      });

      return succeed(approvals, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Pending approvals', correlationId: cid, managerId });
    }
  }

  /**
   * Requests waiting for an internal reviewer to respond or answer
   */
  async getPendingReviews(
    reviewerId: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<PendingReview[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `pending_reviews_${Date.now()}`;

    try {
      const rows = await selectRows<
        FeedbackRequestRecord & { requester_first_name: string; requester_last_name: string; has_draft: boolean }
      >(
        undefined,
        `SELECT fr.*, q.first_name AS requester_first_name, q.last_name AS requester_last_name,
                EXISTS (SELECT 1 FROM draft_responses d WHERE d.request_id = fr.id) AS has_draft
         FROM (
           SELECT ${REQUEST_COLUMNS}
           FROM feedback_requests
           WHERE reviewer_id = $1 AND workflow_state = ANY($2::text[]) AND is_active
         ) fr
         JOIN users q ON q.id = fr.requester_id
         ORDER BY fr.created_at`,
        [reviewerId, [WorkflowState.PendingReviewerAcceptance, WorkflowState.InProgress]],
        { correlationId: cid, operation: 'pending_reviews' }
      );

      const reviews = rows.map((row): PendingReview => {
        const relationship = parseRelationship(row.relationship);
        const state = parseWorkflowState(row.workflow_state);
        return {
          requestId: row.id,
          requesterName: fullName({ firstName: row.requester_first_name, lastName: row.requester_last_name }),
          relationship,
          relationshipLabel: getRelationshipLabel(relationship),
          state,
          stateLabel: getStateLabel(state),
          hasDraft: row.has_draft,
          createdAt: row.created_at,
        };
      });

      return succeed(reviews, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Pending reviews', correlationId: cid, reviewerId });
    }
  }

  /**
   * Completed feedback received by a requester, anonymized
   */
  async getReceivedFeedback(
    requesterId: string,
    cycleId?: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<ReceivedFeedback[]>> {
    const startTime = Date.now();
    const cid = correlationId ?? `received_feedback_${Date.now()}`;

    try {
      const rows = await selectRows<ReceivedAnswerRecord>(
        undefined,
        `SELECT fr.id AS request_id, fr.relationship, fr.completed_at,
                q.question_text, q.question_type, r.rating_value, r.response_value
         FROM feedback_requests fr
         JOIN feedback_responses r ON r.request_id = fr.id
         JOIN feedback_questions q ON q.id = r.question_id
         WHERE fr.requester_id = $1
           AND fr.workflow_state = $2
           AND ($3::uuid IS NULL OR fr.cycle_id = $3::uuid)
         ORDER BY fr.completed_at, fr.id, q.sort_order`,
        [requesterId, WorkflowState.Completed, cycleId ?? null],
        { correlationId: cid, operation: 'received_feedback' }
      );

      return succeed(groupReceivedFeedback(rows), startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Received feedback', correlationId: cid, requesterId });
    }
  }

  /**
   * One request, visible to its requester, reviewer, the requester's manager
   * and HR admins
   */
  async getRequest(
    requestId: string,
    viewerId: string,
    viewerRole: UserRole,
    correlationId?: string
  ): Promise<ServiceOperationResult<FeedbackRequest>> {
    const startTime = Date.now();
    const cid = correlationId ?? `get_request_${Date.now()}`;

    try {
      const record = await this.findRequest(requestId, cid);
      if (!record) {
        throw new WorkflowError(WorkflowErrorCode.NotFound, 'Feedback request not found', { requestId });
      }

      if (viewerRole !== UserRole.HRAdmin && record.requester_id !== viewerId && record.reviewer_id !== viewerId) {
        const requester = await this.directory.getEntry(record.requester_id);
        if (requester?.managerId !== viewerId) {
          throw new WorkflowError(WorkflowErrorCode.Unauthorized, 'You cannot view this request', { requestId });
        }
      }

      return succeed(toFeedbackRequest(record), startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Get request', correlationId: cid, requestId });
    }
  }
}

export const feedbackRequestService = new FeedbackRequestService();
