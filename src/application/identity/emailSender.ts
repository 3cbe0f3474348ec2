import type { Logger } from '../../infra/logger.js';

export interface EmailSender {
  sendConfirmationLink(email: string, confirmationLink: string): Promise<void>;
  sendPasswordResetCode(email: string, resetCode: string): Promise<void>;
}

/**
 * Development sender: writes each message to the log instead of delivering it.
 */
export class LoggingEmailSender implements EmailSender {
  constructor(private logger: Logger) {}

  async sendConfirmationLink(email: string, confirmationLink: string): Promise<void> {
    this.logger.info(
      { to: email, subject: 'Confirm your email' },
      `Please confirm your account by visiting ${confirmationLink}`
    );
  }

  async sendPasswordResetCode(email: string, resetCode: string): Promise<void> {
    this.logger.info(
      { to: email, subject: 'Reset your password' },
      `Please reset your password using the following code: ${resetCode}`
    );
  }
}
