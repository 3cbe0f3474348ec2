import { Password } from '../../domain/identity/password.js';
import { isLockedOut, normalizeKey } from '../../domain/identity/user.js';
import type { LockoutOptions } from '../../config.js';
import { UnauthorizedError } from '../errors.js';
import type { UserStore } from './userStore.js';
import type { AccessTokenResponse, TokenService } from './tokens.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface SignInOptions {
  lockout: LockoutOptions;
  requireConfirmedEmail: boolean;
}

export const INVALID_CREDENTIALS = 'Invalid email or password';

export class LoginUseCase {
  constructor(
    private userStore: UserStore,
    private tokens: TokenService,
    private options: SignInOptions
  ) {}

  async execute(command: LoginCommand): Promise<AccessTokenResponse> {
    const user = await this.userStore.findByNormalizedUserName(normalizeKey(command.email));
    if (!user) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    if (this.options.requireConfirmedEmail && !user.emailConfirmed) {
      throw new UnauthorizedError('Email address has not been confirmed', 'NOT_ALLOWED');
    }
    if (isLockedOut(user)) {
      throw new UnauthorizedError('Account is locked out', 'LOCKED_OUT');
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      const failed = await this.userStore.recordAccessFailure(user.id, this.options.lockout);
      if (failed && isLockedOut(failed)) {
        throw new UnauthorizedError('Account is locked out', 'LOCKED_OUT');
      }
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const signedIn =
      user.accessFailedCount > 0 || user.lockoutEnd !== null
        ? await this.userStore.resetAccessFailures(user.id)
        : user;
    if (!signedIn) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const roles = await this.userStore.getRoleNames(signedIn.id);
    return this.tokens.issueTokenPair(signedIn, roles);
  }
}
