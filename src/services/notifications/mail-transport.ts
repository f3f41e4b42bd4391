import { logger } from '../../config/logger';

/**
 * Outgoing message handed to a transport
 */
export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
}

/**
 * Delivery backend. Implementations may throw; EmailService absorbs failures.
 */
export interface MailTransport {
  readonly name: string;
  send(message: MailMessage): Promise<void>;
}

/**
 * Writes messages to the application log instead of delivering them.
 * Used when no delivery backend is configured.
 */
export class LogMailTransport implements MailTransport {
  readonly name = 'log';

  constructor(private readonly includeBody: boolean) {}

  async send(message: MailMessage): Promise<void> {
    logger.info(
      {
        transport: this.name,
        from: message.from,
        to: message.to,
        subject: message.subject,
      },
      'Outgoing email (no delivery backend configured)'
    );

    if (this.includeBody) {
      logger.debug({ body: message.text }, 'Outgoing email body');
    }
  }
}
