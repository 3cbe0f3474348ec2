import type { EmailSender } from '../../application/identity/emailSender.js';

export interface SentEmail {
  to: string;
  kind: 'confirmation' | 'passwordReset';
  /** Confirmation link or reset code. */
  payload: string;
}

export class RecordingEmailSender implements EmailSender {
  readonly sent: SentEmail[] = [];

  async sendConfirmationLink(email: string, confirmationLink: string): Promise<void> {
    this.sent.push({ to: email, kind: 'confirmation', payload: confirmationLink });
  }

  async sendPasswordResetCode(email: string, resetCode: string): Promise<void> {
    this.sent.push({ to: email, kind: 'passwordReset', payload: resetCode });
  }

  last(kind: SentEmail['kind']): SentEmail {
    const match = [...this.sent].reverse().find((m) => m.kind === kind);
    if (!match) {
      throw new Error(`no ${kind} email was sent`);
    }
    return match;
  }
}
