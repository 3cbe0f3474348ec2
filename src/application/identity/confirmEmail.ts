import { changeEmail, normalizeKey } from '../../domain/identity/user.js';
import { UnauthorizedError } from '../errors.js';
import type { UserStore } from './userStore.js';
import type { TokenService } from './tokens.js';
import type { ConfirmationEmailService } from './confirmationEmail.js';

export interface ConfirmEmailCommand {
  userId: string;
  code: string;
  changedEmail?: string;
}

export const EMAIL_CONFIRMED_MESSAGE = 'Thank you for confirming your email.';

export class ConfirmEmailUseCase {
  constructor(
    private userStore: UserStore,
    private tokens: TokenService
  ) {}

  async execute(command: ConfirmEmailCommand): Promise<void> {
    const user = await this.userStore.findById(command.userId);
    if (!user) {
      throw new UnauthorizedError();
    }

    if (command.changedEmail === undefined) {
      if (!this.tokens.verifyEmailToken(user, 'EmailConfirmation', command.code)) {
        throw new UnauthorizedError();
      }
      if (!user.emailConfirmed) {
        await this.userStore.update({ ...user, emailConfirmed: true });
      }
      return;
    }

    const changedEmail = command.changedEmail;
    if (!this.tokens.verifyEmailToken(user, 'ChangeEmail', command.code, changedEmail)) {
      throw new UnauthorizedError();
    }

    // The email doubles as user name, so it has to stay unique
    const holder = await this.userStore.findByNormalizedUserName(normalizeKey(changedEmail));
    if (holder && holder.id !== user.id) {
      throw new UnauthorizedError();
    }

    await this.userStore.update(changeEmail(user, changedEmail));
  }
}

export interface ResendConfirmationEmailCommand {
  email: string;
}

/**
 * Always succeeds, whether or not the address belongs to a user.
 */
export class ResendConfirmationEmailUseCase {
  constructor(
    private userStore: UserStore,
    private confirmation: ConfirmationEmailService
  ) {}

  async execute(command: ResendConfirmationEmailCommand): Promise<void> {
    const user = await this.userStore.findByNormalizedEmail(normalizeKey(command.email));
    if (!user) {
      return;
    }
    await this.confirmation.send(user, command.email);
  }
}
