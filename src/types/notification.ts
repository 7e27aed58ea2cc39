/**
 * Notification event definitions
 *
 * The workflow decides what happened and who should hear about it; rendering
 * and delivery belong to the notification dispatcher.
 *
 * @module types/notification
 */

import { type RejectingParty } from './feedback.js';

export enum NotificationEventType {
  ManagerApprovalRequested = 'MANAGER_APPROVAL_REQUESTED',
  NominationApproved = 'NOMINATION_APPROVED',
  NominationRejected = 'NOMINATION_REJECTED',
  ExternalInviteReady = 'EXTERNAL_INVITE_READY',
  ReviewerInviteReady = 'REVIEWER_INVITE_READY',
  FeedbackCompleted = 'FEEDBACK_COMPLETED',
}

/**
 * Nominee listed in a manager approval request
 */
export interface NomineeSummary {
  readonly name: string;
  readonly relationshipLabel: string;
  readonly isExternal: boolean;
}

export interface ManagerApprovalRequestedEvent {
  readonly type: NotificationEventType.ManagerApprovalRequested;
  readonly recipientEmail: string;
  readonly managerName: string;
  readonly requesterName: string;
  readonly cycleName: string;
  readonly nominationDeadline: string;
  readonly nominees: readonly NomineeSummary[];
}

export interface NominationApprovedEvent {
  readonly type: NotificationEventType.NominationApproved;
  readonly recipientEmail: string;
  readonly requesterName: string;
  readonly reviewerName: string;
  readonly cycleName: string;

  /**
   * True when approved by the deadline sweep rather than the manager
   */
  readonly automatic: boolean;
}

export interface NominationRejectedEvent {
  readonly type: NotificationEventType.NominationRejected;
  readonly recipientEmail: string;
  readonly requesterName: string;
  readonly reviewerName: string;
  readonly rejectedBy: RejectingParty;
  readonly reason: string;
}

export interface ExternalInviteReadyEvent {
  readonly type: NotificationEventType.ExternalInviteReady;
  readonly recipientEmail: string;
  readonly reviewerName: string;
  readonly requesterName: string;
  readonly cycleName: string;
  readonly feedbackDeadline: string;
  readonly requestId: string;
  readonly token: string;
}

export interface ReviewerInviteReadyEvent {
  readonly type: NotificationEventType.ReviewerInviteReady;
  readonly recipientEmail: string;
  readonly reviewerName: string;
  readonly requesterName: string;
  readonly relationshipLabel: string;
  readonly cycleName: string;
  readonly feedbackDeadline: string;
  readonly requestId: string;
}

export interface FeedbackCompletedEvent {
  readonly type: NotificationEventType.FeedbackCompleted;
  readonly recipientEmail: string;
  readonly requesterName: string;
  readonly relationshipLabel: string;
  readonly cycleName: string;
}

export type NotificationEvent =
  | ManagerApprovalRequestedEvent
  | NominationApprovedEvent
  | NominationRejectedEvent
  | ExternalInviteReadyEvent
  | ReviewerInviteReadyEvent
  | FeedbackCompletedEvent;

/**
 * Notification capability used by the workflow
 */
export interface NotificationDispatcher {
  dispatch(event: NotificationEvent): Promise<void>;
}
