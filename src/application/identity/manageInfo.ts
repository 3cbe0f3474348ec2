import { Password } from '../../domain/identity/password.js';
import { IdentityErrors, IdentityResultError } from '../../domain/identity/errors.js';
import { DEFAULT_PASSWORD_POLICY, validatePassword, type PasswordPolicy } from '../../domain/identity/passwordPolicy.js';
import { changePasswordHash, isValidEmail, type IdentityUser } from '../../domain/identity/user.js';
import { NotFoundError } from '../errors.js';
import type { UserStore } from './userStore.js';
import type { ConfirmationEmailService } from './confirmationEmail.js';

export interface InfoResponse {
  email: string;
  isEmailConfirmed: boolean;
}

export interface UpdateInfoCommand {
  userId: string;
  newEmail?: string;
  newPassword?: string;
  oldPassword?: string;
}

function toInfo(user: IdentityUser): InfoResponse {
  return { email: user.email, isEmailConfirmed: user.emailConfirmed };
}

export class GetInfoUseCase {
  constructor(private userStore: UserStore) {}

  async execute(userId: string): Promise<InfoResponse> {
    const user = await this.userStore.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toInfo(user);
  }
}

/**
 * Changes the password in place. A new email is not applied here: a
 * confirmation link is sent to it and the change lands when that link is followed.
 */
export class UpdateInfoUseCase {
  constructor(
    private userStore: UserStore,
    private confirmation: ConfirmationEmailService,
    private passwordPolicy: PasswordPolicy = DEFAULT_PASSWORD_POLICY
  ) {}

  async execute(command: UpdateInfoCommand): Promise<InfoResponse> {
    let user = await this.userStore.findById(command.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const emailChange = command.newEmail && command.newEmail !== user.email ? command.newEmail : null;
    if (emailChange !== null && !isValidEmail(emailChange)) {
      throw new IdentityResultError([IdentityErrors.invalidEmail(emailChange)]);
    }

    if (command.newPassword) {
      if (!command.oldPassword) {
        throw new IdentityResultError([IdentityErrors.oldPasswordRequired()]);
      }
      if (!(await Password.verify(command.oldPassword, user.passwordHash))) {
        throw new IdentityResultError([IdentityErrors.passwordMismatch()]);
      }
      const passwordErrors = validatePassword(command.newPassword, this.passwordPolicy);
      if (passwordErrors.length > 0) {
        throw new IdentityResultError(passwordErrors);
      }
      user = await this.userStore.update(
        changePasswordHash(user, await Password.hash(command.newPassword))
      );
    }

    if (emailChange !== null) {
      await this.confirmation.send(user, emailChange, true);
    }

    return toInfo(user);
  }
}
