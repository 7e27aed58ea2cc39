/**
 * Deadline Sweeper Service Module
 *
 * Resolves requests still pending once the nomination deadline has passed.
 * Under AUTO_APPROVE, invitations a manager approved are accepted for the
 * reviewer and nominations no manager decided on are approved. Under EXPIRE,
 * or for anything still pending after the feedback deadline, requests are
 * expired. Each request is moved in its own transaction, so a failure on one
 * leaves the others committed and a re-run only touches what is still
 * pending.
 *
 * @module services/deadline-sweeper
 */

import { getWorkflowConfig } from '../config/workflow.js';
import { executeTransaction, queryMany } from '../db/index.js';
import { type Queryable } from '../db/records.js';
import { DeadlinePolicy, PENDING_STATES, SYSTEM_ACTOR, WorkflowState } from '../types/feedback.js';
import { type ServiceOperationResult } from '../types/index.js';
import { type NotificationEvent } from '../types/notification.js';
import { today } from '../utils/date.js';

import {
  cycleService,
  isFeedbackDeadlinePassed,
  isNominationDeadlinePassed,
  type CycleService,
} from './cycle.service.js';
import {
  feedbackRequestService,
  type FeedbackRequestService,
  type TransitionOutcome,
} from './feedback-request.service.js';
import { fail, succeed } from './result.js';

const TAG = 'DEADLINE_SWEEPER';

export type SweepSkipReason = 'NO_ACTIVE_CYCLE' | 'DEADLINE_NOT_PASSED';

export interface SweepFailure {
  readonly requestId: string;
  readonly error: string;
}

/**
 * Outcome of one sweep run
 */
export interface SweepReport {
  readonly cycleId: string | null;
  readonly ranOn: string;
  readonly policy: DeadlinePolicy;
  readonly skipped: SweepSkipReason | null;
  readonly feedbackDeadlinePassed: boolean;
  readonly autoAccepted: number;
  readonly autoApproved: number;
  readonly expired: number;
  readonly notificationsSent: number;
  readonly failures: readonly SweepFailure[];
}

export interface SweepOptions {
  /**
   * Calendar date to sweep as, defaults to today
   */
  readonly today?: string;
  readonly correlationId?: string;
}

type RowTransition = (client: Queryable, requestId: string) => Promise<TransitionOutcome | null>;

interface BatchOutcome {
  changed: number;
  events: NotificationEvent[];
}

export class DeadlineSweeperService {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly cycles: CycleService = cycleService,
    private readonly workflow: FeedbackRequestService = feedbackRequestService
  ) {}

  /**
   * Run one sweep over the active cycle
   */
  async sweep(options: SweepOptions = {}): Promise<ServiceOperationResult<SweepReport>> {
    const startTime = Date.now();
    const cid = options.correlationId ?? `deadline_sweep_${Date.now()}`;
    const ranOn = options.today ?? today();
    const policy = getWorkflowConfig().deadlinePolicy;

    console.log(`[${TAG}] Starting deadline sweep:`, {
      ranOn,
      policy,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    const emptyReport: SweepReport = {
      cycleId: null,
      ranOn,
      policy,
      skipped: null,
      feedbackDeadlinePassed: false,
      autoAccepted: 0,
      autoApproved: 0,
      expired: 0,
      notificationsSent: 0,
      failures: [],
    };

    try {
      const cycle = await this.cycles.getActiveCycle();

      if (!cycle) {
        return succeed({ ...emptyReport, skipped: 'NO_ACTIVE_CYCLE' }, startTime);
      }

      if (!isNominationDeadlinePassed(cycle, ranOn)) {
        return succeed({ ...emptyReport, cycleId: cycle.id, skipped: 'DEADLINE_NOT_PASSED' }, startTime);
      }

      const feedbackDeadlinePassed = isFeedbackDeadlinePassed(cycle, ranOn);
      const failures: SweepFailure[] = [];
      const events: NotificationEvent[] = [];
      let autoAccepted = 0;
      let autoApproved = 0;
      let expired = 0;

      if (feedbackDeadlinePassed || policy === DeadlinePolicy.Expire) {
        const pendingIds = await this.pendingRequestIds(cycle.id, PENDING_STATES, cid);
        const outcome = await this.applyEach(pendingIds, (client, id) => this.workflow.expire(client, id), failures, cid);
        expired = outcome.changed;
        events.push(...outcome.events);
      } else {
        const acceptIds = await this.pendingRequestIds(cycle.id, [WorkflowState.PendingReviewerAcceptance], cid, true);
        const approveIds = await this.pendingRequestIds(cycle.id, [WorkflowState.PendingManagerApproval], cid);

        const accepted = await this.applyEach(
          acceptIds,
          (client, id) => this.workflow.autoAccept(client, id),
          failures,
          cid
        );
        const approved = await this.applyEach(
          approveIds,
          (client, id) => this.workflow.autoApprove(client, id),
          failures,
          cid
        );

        autoAccepted = accepted.changed;
        autoApproved = approved.changed;
        events.push(...accepted.events, ...approved.events);
      }

      const notificationsSent = await this.workflow.notify(events, cid);

      const report: SweepReport = {
        cycleId: cycle.id,
        ranOn,
        policy,
        skipped: null,
        feedbackDeadlinePassed,
        autoAccepted,
        autoApproved,
        expired,
        notificationsSent,
        failures,
      };

      console.log(`[${TAG}] Deadline sweep finished:`, {
        ...report,
        failures: failures.length,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
      });

      return succeed(report, startTime);
    } catch (error) {
      return fail(error, startTime, { tag: TAG, operation: 'Deadline sweep', correlationId: cid });
    }
  }

  /**
   * Ids of requests in the given states, oldest first
   *
   * With `humanApprovedOnly`, requests approved by the sweep itself are left
   * out.
   */
  private async pendingRequestIds(
    cycleId: string,
    states: readonly WorkflowState[],
    correlationId: string,
    humanApprovedOnly = false
  ): Promise<string[]> {
    const rows = await queryMany<{ id: string }>(
      `SELECT id
       FROM feedback_requests
       WHERE cycle_id = $1
         AND is_active
         AND workflow_state = ANY($2::text[])
         AND (NOT $3::boolean OR manager_actor IS DISTINCT FROM $4)
       ORDER BY created_at`,
      [cycleId, [...states], humanApprovedOnly, SYSTEM_ACTOR],
      { correlationId, operation: 'sweep_select_pending' }
    );
    return rows.map((row) => row.id);
  }

  private async applyEach(
    requestIds: readonly string[],
    apply: RowTransition,
    failures: SweepFailure[],
    correlationId: string
  ): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { changed: 0, events: [] };

    for (const requestId of requestIds) {
      try {
        const result = await executeTransaction((client) => apply(client, requestId), {
          correlationId,
          operation: 'sweep_transition',
        });

        if (result) {
          outcome.changed++;
          outcome.events.push(...result.events);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ requestId, error: message });

        console.error(`[${TAG}] Failed to resolve request:`, {
          requestId,
          error: message,
          correlationId,
          timestamp: new Date().toISOString(),
        });
      }
    }

    return outcome;
  }

  /**
   * Run the sweep every `intervalMs`; overlapping runs are skipped
   */
  start(intervalMs: number): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.runScheduled();
    }, intervalMs);
    this.timer.unref();

    console.log(`[${TAG}] Sweep scheduled:`, { intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log(`[${TAG}] Sweep schedule stopped`);
    }
  }

  isScheduled(): boolean {
    return this.timer !== null;
  }

  private async runScheduled(): Promise<void> {
    if (this.running) {
      console.warn(`[${TAG}] Previous sweep still running, skipping this tick`);
      return;
    }

    this.running = true;
    try {
      const result = await this.sweep({ correlationId: `scheduled_sweep_${Date.now()}` });
      if (!result.success) {
        console.error(`[${TAG}] Scheduled sweep failed:`, { error: result.error });
      }
    } finally {
      this.running = false;
    }
  }
}

export const deadlineSweeperService = new DeadlineSweeperService();
