import { env } from '../../config/environment';
import { logger } from '../../config/logger';
import type { MinistrySelection } from '../../models/volunteer.model';
import { LogMailTransport, type MailMessage, type MailTransport } from './mail-transport';

/**
 * Summary of a new signup included in the admin notification
 */
export interface SignupSummary {
  name: string;
  phone: string;
  email: string;
  signupDate: Date;
  ministries: MinistrySelection[];
}

export interface EmailServiceOptions {
  from?: string;
  appBaseUrl?: string;
  resetLinkValidMinutes?: number;
}

/**
 * Composes notification emails and hands them to a transport.
 * Sending never throws: every method resolves to whether the message went out.
 */
export class EmailService {
  private readonly from: string;
  private readonly appBaseUrl: string;
  private readonly resetLinkValidMinutes: number;

  constructor(
    private readonly transport: MailTransport = new LogMailTransport(env.NODE_ENV === 'development'),
    options: EmailServiceOptions = {}
  ) {
    this.from = options.from ?? env.EMAIL_FROM;
    this.appBaseUrl = (options.appBaseUrl ?? env.APP_BASE_URL).replace(/\/+$/, '');
    this.resetLinkValidMinutes = options.resetLinkValidMinutes ?? env.PASSWORD_RESET_EXPIRE_MINUTES;
  }

  buildResetLink(token: string): string {
    return `${this.appBaseUrl}/admin?reset_token=${encodeURIComponent(token)}`;
  }

  /**
   * Send the password reset link to an admin
   */
  async notifyReset(email: string, token: string): Promise<boolean> {
    const text = [
      'Password Reset Request',
      '',
      'You requested a password reset for the volunteer admin dashboard.',
      '',
      `Click the link below to set a new password (valid for ${this.describeValidity()}):`,
      this.buildResetLink(token),
      '',
      'If you did not request this, please ignore this email.',
    ].join('\n');

    return this.send({ from: this.from, to: [email], subject: 'Password Reset', text }, 'reset');
  }

  /**
   * Notify the configured recipients that a volunteer signed up
   */
  async notifyNewSignup(recipients: string[], summary: SignupSummary): Promise<boolean> {
    if (recipients.length === 0) {
      logger.warn('No admin notification emails configured - skipping notification');
      return false;
    }

    const ministryList =
      summary.ministries.length > 0
        ? summary.ministries.map((m) => `  - ${m.area} (${m.category})`).join('\n')
        : '  (none selected)';

    const text = [
      'New Volunteer Signup',
      '',
      'Volunteer Information:',
      `Name: ${summary.name}`,
      `Phone: ${summary.phone}`,
      `Email: ${summary.email}`,
      `Signup Date: ${summary.signupDate.toISOString()}`,
      '',
      'Ministry Areas Selected:',
      ministryList,
    ].join('\n');

    return this.send(
      { from: this.from, to: recipients, subject: `New Volunteer Signup: ${summary.name}`, text },
      'new-signup'
    );
  }

  private describeValidity(): string {
    const minutes = this.resetLinkValidMinutes;
    if (minutes % 60 === 0) {
      const hours = minutes / 60;
      return hours === 1 ? '1 hour' : `${hours} hours`;
    }
    return `${minutes} minutes`;
  }

  private async send(message: MailMessage, kind: string): Promise<boolean> {
    try {
      await this.transport.send(message);
      logger.info({ kind, recipients: message.to.length }, 'Email dispatched');
      return true;
    } catch (error) {
      logger.error({ error, kind, transport: this.transport.name }, 'Email dispatch failed');
      return false;
    }
  }
}

// Singleton instance
export const emailService = new EmailService();

/**
 * Fire-and-forget dispatch: the caller's operation has already committed and
 * must not wait on, or fail because of, notification delivery.
 */
export function dispatchInBackground(delivery: Promise<boolean>, context: Record<string, unknown>): void {
  delivery
    .then((sent) => {
      if (!sent) {
        logger.warn(context, 'Notification was not delivered');
      }
    })
    .catch((error: unknown) => {
      logger.error({ ...context, error }, 'Notification dispatch failed');
    });
}
