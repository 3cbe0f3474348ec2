import { Password } from '../../domain/identity/password.js';
import { IdentityErrors, IdentityResultError } from '../../domain/identity/errors.js';
import { DEFAULT_PASSWORD_POLICY, validatePassword, type PasswordPolicy } from '../../domain/identity/passwordPolicy.js';
import { createUser, isValidEmail, normalizeKey, validateUserName } from '../../domain/identity/user.js';
import type { UserStore } from './userStore.js';
import type { ConfirmationEmailService } from './confirmationEmail.js';

export interface RegisterCommand {
  email: string;
  password: string;
}

export class RegisterUseCase {
  constructor(
    private userStore: UserStore,
    private confirmation: ConfirmationEmailService,
    private passwordPolicy: PasswordPolicy = DEFAULT_PASSWORD_POLICY
  ) {}

  async execute(command: RegisterCommand): Promise<void> {
    const { email, password } = command;
    if (!isValidEmail(email)) {
      throw new IdentityResultError([IdentityErrors.invalidEmail(email)]);
    }

    // Password errors are reported on their own, before any user errors
    const passwordErrors = validatePassword(password, this.passwordPolicy);
    if (passwordErrors.length > 0) {
      throw new IdentityResultError(passwordErrors);
    }

    const userErrors = validateUserName(email);
    if (userErrors.length === 0) {
      const existing = await this.userStore.findByNormalizedUserName(normalizeKey(email));
      if (existing) {
        userErrors.push(IdentityErrors.duplicateUserName(email));
      }
    }
    if (userErrors.length > 0) {
      throw new IdentityResultError(userErrors);
    }

    const passwordHash = await Password.hash(password);
    const user = await this.userStore.create(createUser(email, passwordHash));

    await this.confirmation.send(user, email);
  }
}
