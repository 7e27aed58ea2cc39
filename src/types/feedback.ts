/**
 * Feedback request workflow type definitions
 *
 * Defines the workflow states and their transition table, reviewer identities,
 * relationship categories and the feedback request entity. The transition
 * table is the only place that knows which state changes are legal; labels
 * shown to users are derived from the state.
 *
 * @module types/feedback
 */

import { type BaseEntity, type DirectoryEntry } from './index.js';
import { WorkflowError, WorkflowErrorCode } from './errors.js';

/**
 * Workflow state of a feedback request
 */
export enum WorkflowState {
  /**
   * Created by the requester, waiting for their manager
   */
  PendingManagerApproval = 'PENDING_MANAGER_APPROVAL',

  /**
   * Rejected by the requester's manager (terminal)
   */
  ManagerRejected = 'MANAGER_REJECTED',

  /**
   * Approved, waiting for the reviewer to accept or decline
   */
  PendingReviewerAcceptance = 'PENDING_REVIEWER_ACCEPTANCE',

  /**
   * Declined by the reviewer (terminal)
   */
  ReviewerRejected = 'REVIEWER_REJECTED',

  /**
   * Accepted, the reviewer is writing feedback
   */
  InProgress = 'IN_PROGRESS',

  /**
   * Feedback submitted (terminal)
   */
  Completed = 'COMPLETED',

  /**
   * Closed by the deadline sweep without resolution (terminal)
   */
  Expired = 'EXPIRED',
}

/**
 * Legal transitions per state
 */
export const WORKFLOW_TRANSITIONS: Readonly<Record<WorkflowState, readonly WorkflowState[]>> = {
  [WorkflowState.PendingManagerApproval]: [
    WorkflowState.PendingReviewerAcceptance,
    WorkflowState.ManagerRejected,
    WorkflowState.Expired,
  ],
  [WorkflowState.PendingReviewerAcceptance]: [
    WorkflowState.InProgress,
    WorkflowState.ReviewerRejected,
    WorkflowState.Expired,
  ],
  [WorkflowState.InProgress]: [WorkflowState.Completed],
  [WorkflowState.ManagerRejected]: [],
  [WorkflowState.ReviewerRejected]: [],
  [WorkflowState.Completed]: [],
  [WorkflowState.Expired]: [],
};

/**
 * States that hold a requester quota slot and a reviewer capacity slot
 */
export const COUNTED_STATES: readonly WorkflowState[] = [
  WorkflowState.PendingManagerApproval,
  WorkflowState.PendingReviewerAcceptance,
  WorkflowState.InProgress,
  WorkflowState.Completed,
];

/**
 * States the deadline sweep may resolve
 */
export const PENDING_STATES: readonly WorkflowState[] = [
  WorkflowState.PendingManagerApproval,
  WorkflowState.PendingReviewerAcceptance,
];

/**
 * Display labels
 */
const STATE_LABELS: Readonly<Record<WorkflowState, string>> = {
  [WorkflowState.PendingManagerApproval]: 'Pending Manager Approval',
  [WorkflowState.ManagerRejected]: 'Rejected by Manager',
  [WorkflowState.PendingReviewerAcceptance]: 'Awaiting Reviewer Response',
  [WorkflowState.ReviewerRejected]: 'Declined by Reviewer',
  [WorkflowState.InProgress]: 'In Progress',
  [WorkflowState.Completed]: 'Completed',
  [WorkflowState.Expired]: 'Expired',
};

/**
 * Actor recorded for transitions made by the deadline sweep
 */
export const SYSTEM_ACTOR = 'system';

/**
 * Relationship between requester and reviewer
 *
 * Derived by the engine, never supplied by the caller. `MANAGER` exists for
 * the question catalog; nominating one's own manager is rejected.
 */
export enum RelationshipCategory {
  Peer = 'PEER',
  Manager = 'MANAGER',
  DirectReportee = 'DIRECT_REPORTEE',
  InternalCollaborator = 'INTERNAL_COLLABORATOR',
  ExternalStakeholder = 'EXTERNAL_STAKEHOLDER',
}

const RELATIONSHIP_LABELS: Readonly<Record<RelationshipCategory, string>> = {
  [RelationshipCategory.Peer]: 'Peer',
  [RelationshipCategory.Manager]: 'Manager',
  [RelationshipCategory.DirectReportee]: 'Direct Reportee',
  [RelationshipCategory.InternalCollaborator]: 'Internal Collaborator',
  [RelationshipCategory.ExternalStakeholder]: 'External Stakeholder',
};

/**
 * Deadline policy applied by the sweep once the nomination deadline passes
 */
export enum DeadlinePolicy {
  /**
   * Auto-approve pending nominations and auto-accept pending invitations
   */
  AutoApprove = 'AUTO_APPROVE',

  /**
   * Expire everything still pending
   */
  Expire = 'EXPIRE',
}

/**
 * Reviewer identity as nominated by a requester
 */
export type Reviewer =
  | { readonly kind: 'internal'; readonly userId: string }
  | { readonly kind: 'external'; readonly email: string; readonly displayName: string };

/**
 * Reviewer identity after directory resolution
 */
export type ResolvedReviewer =
  | { readonly kind: 'internal'; readonly entry: DirectoryEntry }
  | { readonly kind: 'external'; readonly email: string; readonly displayName: string };

/**
 * Caller acting as the reviewer of a request
 *
 * External actors come from a validated access token and are bound to the
 * request the token was issued for.
 */
export type ReviewerActor =
  | { readonly kind: 'internal'; readonly userId: string }
  | { readonly kind: 'external'; readonly email: string; readonly requestId: string };

/**
 * Manager decision outcome
 */
export type ManagerDecision = 'APPROVE' | 'REJECT';

/**
 * Reviewer response outcome
 */
export type ReviewerResponse = 'ACCEPT' | 'REJECT';

/**
 * Who closed a nomination by rejecting it
 */
export type RejectingParty = 'MANAGER' | 'REVIEWER';

/**
 * Recorded decision stamp
 */
export interface DecisionRecord {
  /**
   * Outcome as stored, e.g. APPROVED or REJECTED
   */
  readonly outcome: string;

  /**
   * User id, external email or the system actor
   */
  readonly actor: string;

  /**
   * Reason given with a rejection
   */
  readonly reason: string | null;

  /**
   * When the decision was recorded
   */
  readonly decidedAt: Date;
}

/**
 * Feedback request entity
 */
export interface FeedbackRequest extends BaseEntity {
  /**
   * Cycle the request belongs to
   */
  readonly cycleId: string;

  /**
   * Employee asking for feedback
   */
  readonly requesterId: string;

  /**
   * Nominated reviewer
   */
  readonly reviewer: Reviewer;

  /**
   * Derived relationship category
   */
  readonly relationship: RelationshipCategory;

  /**
   * Current workflow state
   */
  readonly state: WorkflowState;

  /**
   * Manager approval or rejection
   */
  readonly managerDecision: DecisionRecord | null;

  /**
   * Reviewer acceptance or decline
   */
  readonly reviewerResponse: DecisionRecord | null;

  /**
   * Whether the request holds quota and capacity slots
   */
  readonly countsTowardQuota: boolean;

  /**
   * When feedback was submitted
   */
  readonly completedAt: Date | null;
}

/**
 * Summary of a nomination as shown to the requester
 */
export interface NominationSummary {
  readonly requestId: string;
  readonly reviewerName: string;
  readonly reviewerEmail: string;
  readonly isExternal: boolean;
  readonly relationship: RelationshipCategory;
  readonly state: WorkflowState;
  readonly stateLabel: string;
  readonly rejectionReason: string | null;
  readonly createdAt: Date;
}

/**
 * Nomination status for a requester in a cycle
 */
export interface NominationStatus {
  readonly cycleId: string;
  readonly activeNominations: readonly NominationSummary[];
  readonly rejectedNominations: readonly NominationSummary[];
  readonly countedTotal: number;
  readonly remainingSlots: number;
}

/**
 * Directory entry annotated for the reviewer picker
 */
export interface SelectableReviewer {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly vertical: string | null;
  readonly designation: string | null;
  readonly currentLoad: number;
  readonly atLimit: boolean;
  readonly alreadyNominated: boolean;

  /**
   * Set when the requester's earlier nomination of this colleague was
   * rejected; such colleagues cannot be picked again in the cycle
   */
  readonly rejectedBy: RejectingParty | null;
  readonly isManager: boolean;
  readonly selectable: boolean;
}

/**
 * Nomination waiting for a manager's decision
 */
export interface PendingApproval {
  readonly requestId: string;
  readonly requesterId: string;
  readonly requesterName: string;
  readonly reviewerName: string;
  readonly reviewerEmail: string;
  readonly isExternal: boolean;
  readonly relationship: RelationshipCategory;
  readonly relationshipLabel: string;
  readonly createdAt: Date;
}

/**
 * Request waiting for an internal reviewer's response or answers
 */
export interface PendingReview {
  readonly requestId: string;
  readonly requesterName: string;
  readonly relationship: RelationshipCategory;
  readonly relationshipLabel: string;
  readonly state: WorkflowState;
  readonly stateLabel: string;
  readonly hasDraft: boolean;
  readonly createdAt: Date;
}

/**
 * Type guard for WorkflowState
 */
export function isWorkflowState(value: unknown): value is WorkflowState {
  return (
    typeof value === 'string' &&
    Object.values<string>(WorkflowState).includes(value)
  );
}

/**
 * Type guard for RelationshipCategory
 */
export function isRelationshipCategory(value: unknown): value is RelationshipCategory {
  return (
    typeof value === 'string' &&
    Object.values<string>(RelationshipCategory).includes(value)
  );
}

/**
 * Whether no further transition is possible from a state
 */
export function isTerminalState(state: WorkflowState): boolean {
  return WORKFLOW_TRANSITIONS[state].length === 0;
}

/**
 * Whether a transition is listed in the transition table
 */
export function canTransition(from: WorkflowState, to: WorkflowState): boolean {
  return WORKFLOW_TRANSITIONS[from].includes(to);
}

/**
 * Throw INVALID_TRANSITION unless the transition is legal
 */
export function assertTransition(
  from: WorkflowState,
  to: WorkflowState,
  requestId?: string
): void {
  if (!canTransition(from, to)) {
    const allowed = WORKFLOW_TRANSITIONS[from];
    throw new WorkflowError(
      WorkflowErrorCode.InvalidTransition,
      `Cannot move request from ${from} to ${to}. ` +
        `Allowed transitions: ${allowed.length > 0 ? allowed.join(', ') : 'none'}`,
      { requestId, from, to }
    );
  }
}

export function getRejectingParty(state: WorkflowState): RejectingParty | null {
  if (state === WorkflowState.ManagerRejected) {
    return 'MANAGER';
  }
  if (state === WorkflowState.ReviewerRejected) {
    return 'REVIEWER';
  }
  return null;
}

export function getStateLabel(state: WorkflowState): string {
  return STATE_LABELS[state];
}

export function getRelationshipLabel(relationship: RelationshipCategory): string {
  return RELATIONSHIP_LABELS[relationship];
}

/**
 * Normalize an email for identity comparison
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Stable identity key for a reviewer, used for duplicate and lock checks
 */
export function reviewerKey(reviewer: Reviewer): string {
  return reviewer.kind === 'internal'
    ? `user:${reviewer.userId}`
    : `email:${normalizeEmail(reviewer.email)}`;
}

/**
 * Derive the relationship category between a requester and a reviewer
 *
 * @throws WorkflowError SELF_MANAGER_NOMINATION when the reviewer is the
 * requester's direct manager
 */
export function deriveRelationship(
  requester: DirectoryEntry,
  reviewer: ResolvedReviewer
): RelationshipCategory {
  if (reviewer.kind === 'external') {
    if (
      requester.managerEmail !== null &&
      normalizeEmail(requester.managerEmail) === normalizeEmail(reviewer.email)
    ) {
      throw new WorkflowError(
        WorkflowErrorCode.SelfManagerNomination,
        'Your manager cannot be nominated as an external stakeholder',
        { email: normalizeEmail(reviewer.email) }
      );
    }
    return RelationshipCategory.ExternalStakeholder;
  }

  const entry = reviewer.entry;

  if (requester.managerId !== null && entry.id === requester.managerId) {
    throw new WorkflowError(
      WorkflowErrorCode.SelfManagerNomination,
      'Your direct manager cannot be nominated as a reviewer',
      { reviewerId: entry.id }
    );
  }

  if (entry.managerId !== null && entry.managerId === requester.id) {
    return RelationshipCategory.DirectReportee;
  }

  const requesterVertical = requester.vertical?.trim().toLowerCase() ?? '';
  const reviewerVertical = entry.vertical?.trim().toLowerCase() ?? '';

  if (requesterVertical !== '' && requesterVertical === reviewerVertical) {
    return RelationshipCategory.Peer;
  }

  return RelationshipCategory.InternalCollaborator;
}
