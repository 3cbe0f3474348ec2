import { Password } from '../../domain/identity/password.js';
import { IdentityErrors, IdentityResultError } from '../../domain/identity/errors.js';
import { DEFAULT_PASSWORD_POLICY, validatePassword, type PasswordPolicy } from '../../domain/identity/passwordPolicy.js';
import { changePasswordHash, normalizeKey, resetAccessFailures } from '../../domain/identity/user.js';
import type { UserStore } from './userStore.js';
import type { TokenService } from './tokens.js';
import type { EmailSender } from './emailSender.js';

export interface ForgotPasswordCommand {
  email: string;
}

/**
 * Mails a reset code to confirmed addresses. Reports success either way so the
 * endpoint cannot be used to discover accounts.
 */
export class ForgotPasswordUseCase {
  constructor(
    private userStore: UserStore,
    private tokens: TokenService,
    private emailSender: EmailSender
  ) {}

  async execute(command: ForgotPasswordCommand): Promise<void> {
    const user = await this.userStore.findByNormalizedEmail(normalizeKey(command.email));
    if (!user || !user.emailConfirmed) {
      return;
    }
    const resetCode = this.tokens.generateEmailToken(user, 'ResetPassword');
    await this.emailSender.sendPasswordResetCode(command.email, resetCode);
  }
}

export interface ResetPasswordCommand {
  email: string;
  resetCode: string;
  newPassword: string;
}

export class ResetPasswordUseCase {
  constructor(
    private userStore: UserStore,
    private tokens: TokenService,
    private passwordPolicy: PasswordPolicy = DEFAULT_PASSWORD_POLICY
  ) {}

  async execute(command: ResetPasswordCommand): Promise<void> {
    const user = await this.userStore.findByNormalizedEmail(normalizeKey(command.email));

    // Unknown and unconfirmed users look exactly like a bad code
    if (
      !user ||
      !user.emailConfirmed ||
      !this.tokens.verifyEmailToken(user, 'ResetPassword', command.resetCode)
    ) {
      throw new IdentityResultError([IdentityErrors.invalidToken()]);
    }

    const passwordErrors = validatePassword(command.newPassword, this.passwordPolicy);
    if (passwordErrors.length > 0) {
      throw new IdentityResultError(passwordErrors);
    }

    const passwordHash = await Password.hash(command.newPassword);
    await this.userStore.update(resetAccessFailures(changePasswordHash(user, passwordHash)));
  }
}
