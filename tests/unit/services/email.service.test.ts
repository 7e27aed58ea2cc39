/**
 * Email Service Unit Tests
 *
 * Delivery, retry with backoff and disabled mode of EmailService, against a
 * mocked nodemailer transport.
 *
 * @module tests/unit/services/email.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const transport = vi.hoisted(() => ({
  sendMail: vi.fn(),
  verify: vi.fn(),
  close: vi.fn(),
}));

vi.mock('nodemailer', () => ({
  default: {
    createTransport: () => transport,
  },
}));

import { type EmailConfig } from '../../../src/config/email.js';
import { EmailService, escapeHtml } from '../../../src/services/email.service.js';

const baseConfig: EmailConfig = {
  host: 'smtp.test.example',
  port: 587,
  secure: false,
  auth: { user: 'mailer', pass: 'test-password' },
  from: 'Feedback <noreply@example.com>',
  connectionTimeout: 5000,
  socketTimeout: 5000,
  maxRetries: 3,
  enabled: true,
  environment: 'test',
};

const message = {
  to: 'alice@example.com',
  subject: 'You have received new feedback',
  text: 'Hello Alice',
};

describe('EmailService', () => {
  let service: EmailService;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    service = new EmailService({ config: baseConfig, retryBaseDelayMs: 0 });
  });

  describe('send', () => {
    it('should send through the transport with the configured sender', async () => {
      transport.sendMail.mockResolvedValue({ messageId: '<msg-1@test>' });

      const result = await service.send(message);

      expect(result).toEqual({ success: true, messageId: '<msg-1@test>', attempts: 1 });
      expect(transport.sendMail).toHaveBeenCalledWith({
        from: 'Feedback <noreply@example.com>',
        to: 'alice@example.com',
        subject: 'You have received new feedback',
        text: 'Hello Alice',
        html: undefined,
      });
    });

    it('should retry until a send succeeds', async () => {
      transport.sendMail
        .mockRejectedValueOnce(new Error('Connection reset'))
        .mockResolvedValueOnce({ messageId: '<msg-2@test>' });

      const result = await service.send(message);

      expect(result).toEqual({ success: true, messageId: '<msg-2@test>', attempts: 2 });
      expect(transport.sendMail).toHaveBeenCalledTimes(2);
    });

    it('should give up after the configured number of attempts', async () => {
      transport.sendMail.mockRejectedValue(new Error('Greeting never received'));

      const result = await service.send(message);

      expect(result).toEqual({ success: false, error: 'Greeting never received', attempts: 3 });
      expect(transport.sendMail).toHaveBeenCalledTimes(3);
    });

    it('should reject an invalid recipient without sending', async () => {
      const result = await service.send({ ...message, to: 'not-an-address' });

      expect(result).toEqual({ success: false, error: 'Invalid recipient address: not-an-address', attempts: 0 });
      expect(transport.sendMail).not.toHaveBeenCalled();
    });

    it('should skip sending when delivery is disabled', async () => {
      const disabled = new EmailService({ config: { ...baseConfig, enabled: false } });

      const result = await disabled.send(message);

      expect(result).toEqual({ success: false, error: 'Email service is disabled', attempts: 0 });
      expect(disabled.isEnabled()).toBe(false);
      expect(transport.sendMail).not.toHaveBeenCalled();
    });
  });

  describe('verifyConnection', () => {
    it('should report a failed verification as false', async () => {
      transport.verify.mockRejectedValue(new Error('Invalid login'));

      await expect(service.verifyConnection()).resolves.toBe(false);
    });

    it('should report a verified connection as true', async () => {
      transport.verify.mockResolvedValue(true);

      await expect(service.verifyConnection()).resolves.toBe(true);
    });
  });

  describe('close', () => {
    it('should close an open transport once', async () => {
      transport.sendMail.mockResolvedValue({ messageId: '<msg-3@test>' });
      await service.send(message);

      service.close();
      service.close();

      expect(transport.close).toHaveBeenCalledTimes(1);
    });
  });
});

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe('&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;');
  });
});
