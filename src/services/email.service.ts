/**
 * Email Service Module
 *
 * Hands rendered notifications to an SMTP relay through nodemailer, retrying
 * with exponential backoff. Message content comes from the notification
 * service.
 *
 * @module services/email
 */

import nodemailer, { type Transporter } from 'nodemailer';

import { getEmailConfig, type EmailConfig } from '../config/email.js';

const TAG = 'EMAIL_SERVICE';

const RECIPIENT_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const MAX_BACKOFF_MS = 10000;

/**
 * A rendered message ready for delivery
 */
export interface OutgoingEmail {
  readonly to: string;
  readonly subject: string;
  readonly text: string;
  readonly html?: string;

  /**
   * Notification type or other label carried into the delivery logs
   */
  readonly category?: string;
}

/**
 * Outcome of one delivery, after retries
 */
export interface DeliveryResult {
  readonly success: boolean;
  readonly messageId?: string;
  readonly error?: string;
  readonly attempts: number;
}

export interface EmailServiceOptions {
  /**
   * Configuration to use instead of the environment singleton
   */
  readonly config?: EmailConfig;

  /**
   * First backoff delay in milliseconds, doubled per attempt
   */
  readonly retryBaseDelayMs?: number;
}

/**
 * Escape text for interpolation into HTML
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function checkMessage(message: OutgoingEmail): string | null {
  if (!RECIPIENT_PATTERN.test(message.to)) {
    return `Invalid recipient address: ${message.to}`;
  }
  if (message.subject.trim().length === 0) {
    return 'Email subject is required';
  }
  if (message.text.trim().length === 0) {
    return 'Email body is required';
  }
  return null;
}

export class EmailService {
  private transport: Transporter | null = null;
  private readonly config: EmailConfig;
  private readonly retryBaseDelayMs: number;

  constructor(options?: EmailServiceOptions) {
    this.config = options?.config ?? getEmailConfig();
    this.retryBaseDelayMs = options?.retryBaseDelayMs ?? 1000;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  private openTransport(): Transporter {
    if (this.transport) {
      return this.transport;
    }

    const { host, port, secure, auth, connectionTimeout, socketTimeout } = this.config;
    console.log(`[${TAG}] Opening SMTP transport:`, { host, port, secure, authenticated: auth !== undefined });

    this.transport = nodemailer.createTransport({ host, port, secure, auth, connectionTimeout, socketTimeout });
    return this.transport;
  }

  /**
   * Deliver a message, retrying up to the configured attempt count
   *
   * Never throws; a disabled service, a malformed message and an exhausted
   * retry budget all come back as `success: false`.
   */
  async send(message: OutgoingEmail): Promise<DeliveryResult> {
    const logContext = { to: message.to, category: message.category };

    if (!this.config.enabled) {
      console.log(`[${TAG}] Delivery disabled, message dropped:`, logContext);
      return { success: false, error: 'Email service is disabled', attempts: 0 };
    }

    const problem = checkMessage(message);
    if (problem) {
      console.error(`[${TAG}] Message rejected before sending:`, { ...logContext, error: problem });
      return { success: false, error: problem, attempts: 0 };
    }

    const transport = this.openTransport();
    const maxAttempts = this.config.maxRetries;
    let lastError = 'Unknown error';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const info: { messageId?: string } = await transport.sendMail({
          from: this.config.from,
          to: message.to,
          subject: message.subject,
          text: message.text,
          html: message.html,
        });

        console.log(`[${TAG}] Message accepted by relay:`, { ...logContext, messageId: info.messageId, attempt });
        return { success: true, messageId: info.messageId, attempts: attempt };
      } catch (error) {
        lastError = describeError(error);
        console.error(`[${TAG}] Delivery attempt ${attempt}/${maxAttempts} failed:`, {
          ...logContext,
          error: lastError,
          timestamp: new Date().toISOString(),
        });

        if (attempt < maxAttempts) {
          const delay = Math.min(this.retryBaseDelayMs * Math.pow(2, attempt - 1), MAX_BACKOFF_MS);
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    return { success: false, error: lastError, attempts: maxAttempts };
  }

  /**
   * Check that the relay accepts a connection; false when disabled
   */
  async verifyConnection(): Promise<boolean> {
    if (!this.config.enabled) {
      return false;
    }

    try {
      await this.openTransport().verify();
      console.log(`[${TAG}] SMTP relay reachable`);
      return true;
    } catch (error) {
      console.error(`[${TAG}] SMTP relay check failed:`, { error: describeError(error) });
      return false;
    }
  }

  close(): void {
    if (!this.transport) {
      return;
    }
    this.transport.close();
    this.transport = null;
    console.log(`[${TAG}] SMTP transport closed`);
  }
}

let emailServiceInstance: EmailService | null = null;

export function getEmailService(): EmailService {
  if (!emailServiceInstance) {
    emailServiceInstance = new EmailService();
  }
  return emailServiceInstance;
}

/**
 * Close the transport and drop the email service singleton
 */
export function resetEmailService(): void {
  emailServiceInstance?.close();
  emailServiceInstance = null;
}
