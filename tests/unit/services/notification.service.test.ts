/**
 * Notification Service Unit Tests
 *
 * @module tests/unit/services/notification.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { type EmailConfig } from '../../../src/config/email.js';
import { EmailService } from '../../../src/services/email.service.js';
import {
  EmailNotificationDispatcher,
  dispatchAll,
  renderNotification,
} from '../../../src/services/notification.service.js';
import { NotificationEventType, type NotificationEvent } from '../../../src/types/notification.js';

const BASE_URL = 'https://feedback.test';

const approvalRequested: NotificationEvent = {
  type: NotificationEventType.ManagerApprovalRequested,
  recipientEmail: 'mgr@example.com',
  managerName: 'Morgan Lee',
  requesterName: 'Alice Smith',
  cycleName: 'H1 2026',
  nominationDeadline: '2026-03-15',
  nominees: [
    { name: 'Bob Jones', relationshipLabel: 'Peer', isExternal: false },
    { name: 'Erin Ext', relationshipLabel: 'External Stakeholder', isExternal: true },
  ],
};

const externalInvite: NotificationEvent = {
  type: NotificationEventType.ExternalInviteReady,
  recipientEmail: 'erin+ops@partner.example',
  reviewerName: 'Erin Ext',
  requesterName: 'Alice Smith',
  cycleName: 'H1 2026',
  feedbackDeadline: '2026-03-31',
  requestId: 'req-1',
  token: 'test-token',
};

const disabledConfig: EmailConfig = {
  host: 'localhost',
  port: 587,
  secure: false,
  from: 'noreply@example.com',
  connectionTimeout: 5000,
  socketTimeout: 5000,
  maxRetries: 1,
  enabled: false,
  environment: 'test',
};

describe('renderNotification', () => {
  it('should list nominees and the deadline for the manager', () => {
    const rendered = renderNotification(approvalRequested, BASE_URL);

    expect(rendered.subject).toBe('Feedback nominations from Alice Smith need your approval');
    expect(rendered.text).toContain('- Bob Jones (Peer)\n- Erin Ext (External Stakeholder, external)');
    expect(rendered.text).toContain('Please approve or reject these nominations by Sunday, 15 March 2026.');
    expect(rendered.text).toContain('Review them at https://feedback.test/approvals');
  });

  it('should put an encoded access link in external invitations', () => {
    const rendered = renderNotification(externalInvite, BASE_URL);

    expect(rendered.subject).toBe('Alice Smith would value your feedback');
    expect(rendered.text).toContain(
      'Open your feedback form: https://feedback.test/external-feedback?email=erin%2Bops%40partner.example&token=test-token'
    );
    expect(rendered.text).toContain('Please respond by Tuesday, 31 March 2026.');
  });

  it('should say who rejected a nomination', () => {
    const byManager = renderNotification(
      {
        type: NotificationEventType.NominationRejected,
        recipientEmail: 'alice@example.com',
        requesterName: 'Alice Smith',
        reviewerName: 'Bob Jones',
        rejectedBy: 'MANAGER',
        reason: 'Too close to the project',
      },
      BASE_URL
    );
    const byReviewer = renderNotification(
      {
        type: NotificationEventType.NominationRejected,
        recipientEmail: 'alice@example.com',
        requesterName: 'Alice Smith',
        reviewerName: 'Bob Jones',
        rejectedBy: 'REVIEWER',
        reason: 'On leave',
      },
      BASE_URL
    );

    expect(byManager.text).toContain('Your manager rejected your nomination of Bob Jones.');
    expect(byReviewer.text).toContain('Bob Jones declined your feedback request.');
    expect(byReviewer.text).toContain('Reason: On leave');
  });

  it('should mention automatic approvals', () => {
    const rendered = renderNotification(
      {
        type: NotificationEventType.NominationApproved,
        recipientEmail: 'alice@example.com',
        requesterName: 'Alice Smith',
        reviewerName: 'Bob Jones',
        cycleName: 'H1 2026',
        automatic: true,
      },
      BASE_URL
    );

    expect(rendered.text).toContain(
      'Your nomination of Bob Jones for H1 2026 was approved automatically after the nomination deadline.'
    );
  });

  it('should escape names in the HTML body', () => {
    const rendered = renderNotification(
      {
        type: NotificationEventType.FeedbackCompleted,
        recipientEmail: 'alice@example.com',
        requesterName: 'Alice <Admin>',
        relationshipLabel: 'Peer',
        cycleName: 'H1 2026',
      },
      BASE_URL
    );

    expect(rendered.html).toContain('<h2>Hello Alice &lt;Admin&gt;,</h2>');
    expect(rendered.text.startsWith('Hello Alice <Admin>,')).toBe(true);
  });
});

describe('dispatchAll', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should count delivered events and carry on past a failure', async () => {
    const dispatch = vi.fn();
    dispatch.mockRejectedValueOnce(new Error('SMTP down')).mockResolvedValue(undefined);

    const delivered = await dispatchAll({ dispatch }, [approvalRequested, externalInvite], 'cid-1');

    expect(delivered).toBe(1);
    expect(dispatch).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenCalledWith(
      '[NOTIFICATION_SERVICE] Notification dispatch failed:',
      expect.objectContaining({ type: NotificationEventType.ManagerApprovalRequested, error: 'SMTP down' })
    );
  });
});

describe('EmailNotificationDispatcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should send the rendered message to the event recipient', async () => {
    const email = new EmailService({ config: disabledConfig });
    const send = vi.spyOn(email, 'send').mockResolvedValue({ success: true, messageId: 'm-1', attempts: 1 });
    const dispatcher = new EmailNotificationDispatcher(email, BASE_URL);
    const rendered = renderNotification(externalInvite, BASE_URL);

    await dispatcher.dispatch(externalInvite);

    expect(send).toHaveBeenCalledWith({
      to: 'erin+ops@partner.example',
      subject: rendered.subject,
      text: rendered.text,
      html: rendered.html,
      category: NotificationEventType.ExternalInviteReady,
    });
  });

  it('should log and resolve when delivery fails', async () => {
    const dispatcher = new EmailNotificationDispatcher(new EmailService({ config: disabledConfig }), BASE_URL);

    await expect(dispatcher.dispatch(externalInvite)).resolves.toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith(
      '[NOTIFICATION_SERVICE] Notification not delivered:',
      expect.objectContaining({ error: 'Email service is disabled', attempts: 0 })
    );
  });
});
