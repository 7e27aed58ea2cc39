/**
 * Notification Service Module
 *
 * Renders workflow notification events into plain messages and delivers them
 * by email. Delivery problems are logged; they never undo the transition that
 * produced the event.
 *
 * @module services/notification
 */

import { getWorkflowConfig } from '../config/workflow.js';
import {
  NotificationEventType,
  type NotificationDispatcher,
  type NotificationEvent,
} from '../types/notification.js';
import { formatDeadline } from '../utils/date.js';

import { escapeHtml, getEmailService, type EmailService } from './email.service.js';

/**
 * Rendered message
 */
export interface RenderedMessage {
  readonly subject: string;
  readonly text: string;
  readonly html: string;
}

function toHtml(title: string, paragraphs: readonly string[]): string {
  const body = paragraphs.map((paragraph) => `<p>${escapeHtml(paragraph)}</p>`).join('\n');
  return `<!DOCTYPE html>
<html>
  <body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333;">
    <h2>${escapeHtml(title)}</h2>
    ${body}
    <p style="font-size: 12px; color: #666;">This is an automated message from the 360 feedback service.</p>
  </body>
</html>`;
}

function message(subject: string, title: string, paragraphs: readonly string[]): RenderedMessage {
  return {
    subject,
    text: `${title}\n\n${paragraphs.join('\n\n')}\n\n---\nThis is an automated message from the 360 feedback service.`,
    html: toHtml(title, paragraphs),
  };
}

/**
 * Render an event into subject, text and HTML
 */
export function renderNotification(event: NotificationEvent, publicBaseUrl: string): RenderedMessage {
  switch (event.type) {
    case NotificationEventType.ManagerApprovalRequested:
      return message(
        `Feedback nominations from ${event.requesterName} need your approval`,
        `Hello ${event.managerName},`,
        [
          `${event.requesterName} has nominated reviewers for ${event.cycleName}:`,
          event.nominees
            .map((nominee) => `- ${nominee.name} (${nominee.relationshipLabel}${nominee.isExternal ? ', external' : ''})`)
            .join('\n'),
          `Please approve or reject these nominations by ${formatDeadline(event.nominationDeadline)}.`,
          `Review them at ${publicBaseUrl}/approvals`,
        ]
      );

    case NotificationEventType.NominationApproved:
      return message(
        `Your feedback nomination for ${event.reviewerName} was approved`,
        `Hello ${event.requesterName},`,
        [
          event.automatic
            ? `Your nomination of ${event.reviewerName} for ${event.cycleName} was approved automatically after the nomination deadline.`
            : `Your manager approved your nomination of ${event.reviewerName} for ${event.cycleName}.`,
          `${event.reviewerName} has been invited to give feedback.`,
        ]
      );

    case NotificationEventType.NominationRejected:
      return message(
        `Your feedback nomination for ${event.reviewerName} was not accepted`,
        `Hello ${event.requesterName},`,
        [
          event.rejectedBy === 'MANAGER'
            ? `Your manager rejected your nomination of ${event.reviewerName}.`
            : `${event.reviewerName} declined your feedback request.`,
          `Reason: ${event.reason}`,
          'You can nominate another reviewer while the nomination window is open.',
        ]
      );

    case NotificationEventType.ExternalInviteReady: {
      const link =
        `${publicBaseUrl}/external-feedback?email=${encodeURIComponent(event.recipientEmail)}` +
        `&token=${encodeURIComponent(event.token)}`;
      return message(
        `${event.requesterName} would value your feedback`,
        `Hello ${event.reviewerName},`,
        [
          `${event.requesterName} has asked you for feedback as part of ${event.cycleName}.`,
          `Please respond by ${formatDeadline(event.feedbackDeadline)}.`,
          `Open your feedback form: ${link}`,
          `If the link does not work, sign in with this email address and the access code ${event.token}`,
        ]
      );
    }

    case NotificationEventType.ReviewerInviteReady:
      return message(
        `${event.requesterName} has requested your feedback`,
        `Hello ${event.reviewerName},`,
        [
          `${event.requesterName} has asked you for feedback as their ${event.relationshipLabel.toLowerCase()} for ${event.cycleName}.`,
          `Please accept or decline the request, then complete it by ${formatDeadline(event.feedbackDeadline)}.`,
          `Open it at ${publicBaseUrl}/reviews/${event.requestId}`,
        ]
      );

    case NotificationEventType.FeedbackCompleted:
      return message(
        'You have received new feedback',
        `Hello ${event.requesterName},`,
        [
          `A reviewer (${event.relationshipLabel}) has completed your feedback for ${event.cycleName}.`,
          `Read it at ${publicBaseUrl}/feedback`,
        ]
      );
  }
}

/**
 * Email-backed notification dispatcher
 */
export class EmailNotificationDispatcher implements NotificationDispatcher {
  constructor(
    private readonly emailService: EmailService = getEmailService(),
    private readonly publicBaseUrl: string = getWorkflowConfig().publicBaseUrl
  ) {}

  async dispatch(event: NotificationEvent): Promise<void> {
    const rendered = renderNotification(event, this.publicBaseUrl);

    const result = await this.emailService.send({
      to: event.recipientEmail,
      subject: rendered.subject,
      text: rendered.text,
      html: rendered.html,
      category: event.type,
    });

    if (result.success) {
      console.log('[NOTIFICATION_SERVICE] Notification delivered:', {
        type: event.type,
        to: event.recipientEmail,
        messageId: result.messageId,
        timestamp: new Date().toISOString(),
      });
    } else {
      console.warn('[NOTIFICATION_SERVICE] Notification not delivered:', {
        type: event.type,
        to: event.recipientEmail,
        error: result.error,
        attempts: result.attempts,
        timestamp: new Date().toISOString(),
      });
    }
  }
}

/**
 * Deliver events one by one after a committed transition
 *
 * A failing event is logged and does not stop the rest.
 *
 * @returns Number of events handed to the dispatcher without error
 */
export async function dispatchAll(
  dispatcher: NotificationDispatcher,
  events: readonly NotificationEvent[],
  correlationId?: string
): Promise<number> {
  let dispatched = 0;

  for (const event of events) {
    try {
      await dispatcher.dispatch(event);
      dispatched++;
    } catch (error) {
      console.error('[NOTIFICATION_SERVICE] Notification dispatch failed:', {
        type: event.type,
        to: event.recipientEmail,
        error: error instanceof Error ? error.message : String(error),
        correlationId,
        timestamp: new Date().toISOString(),
      });
    }
  }

  return dispatched;
}

let dispatcherInstance: NotificationDispatcher | null = null;

/**
 * Get notification dispatcher singleton
 */
export function getNotificationDispatcher(): NotificationDispatcher {
  if (!dispatcherInstance) {
    dispatcherInstance = new EmailNotificationDispatcher();
  }
  return dispatcherInstance;
}
