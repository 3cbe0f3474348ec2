import type { IdentityUser } from '../../domain/identity/user.js';
import type { EmailSender } from './emailSender.js';
import type { TokenService } from './tokens.js';

export interface ConfirmationLinkOptions {
  publicBaseUrl: string;
  identityPathPrefix: string;
}

/**
 * Builds confirmation links pointing back at GET {prefix}/confirmEmail and mails them.
 */
export class ConfirmationEmailService {
  constructor(
    private tokens: TokenService,
    private emailSender: EmailSender,
    private options: ConfirmationLinkOptions
  ) {}

  /**
   * With `isChange`, the link confirms a switch to `email` rather than the current address.
   */
  async send(user: IdentityUser, email: string, isChange = false): Promise<void> {
    const code = isChange
      ? this.tokens.generateEmailToken(user, 'ChangeEmail', email)
      : this.tokens.generateEmailToken(user, 'EmailConfirmation');

    const params = new URLSearchParams({ userId: user.id, code });
    if (isChange) {
      params.set('changedEmail', email);
    }

    const link = `${this.options.publicBaseUrl}${this.options.identityPathPrefix}/confirmEmail?${params.toString()}`;
    await this.emailSender.sendConfirmationLink(email, link);
  }
}
