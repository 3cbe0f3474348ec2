import { isLockedOut } from '../../domain/identity/user.js';
import { UnauthorizedError } from '../errors.js';
import type { UserStore } from './userStore.js';
import type { AccessTokenResponse, TokenService } from './tokens.js';

export interface RefreshCommand {
  refreshToken: string;
}

/**
 * Exchange a refresh token for a new pair. The token stops working once the
 * user's security stamp changes (password reset, email change, logout).
 */
export class RefreshUseCase {
  constructor(
    private userStore: UserStore,
    private tokens: TokenService,
    private requireConfirmedEmail = false
  ) {}

  async execute(command: RefreshCommand): Promise<AccessTokenResponse> {
    const claims = this.tokens.verifyRefreshToken(command.refreshToken);
    if (!claims) {
      throw new UnauthorizedError('Invalid refresh token');
    }

    const user = await this.userStore.findById(claims.userId);
    if (
      !user ||
      user.securityStamp !== claims.securityStamp ||
      isLockedOut(user) ||
      (this.requireConfirmedEmail && !user.emailConfirmed)
    ) {
      throw new UnauthorizedError('Invalid refresh token');
    }

    const roles = await this.userStore.getRoleNames(user.id);
    return this.tokens.issueTokenPair(user, roles);
  }
}
