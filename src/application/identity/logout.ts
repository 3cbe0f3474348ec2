import { newSecurityStamp } from '../../domain/identity/user.js';
import { UnauthorizedError } from '../errors.js';
import type { UserStore } from './userStore.js';

/**
 * Rotates the security stamp so outstanding refresh tokens and emailed codes stop validating.
 * Access tokens already issued stay valid until they expire.
 */
export class LogoutUseCase {
  constructor(private userStore: UserStore) {}

  async execute(userId: string): Promise<void> {
    const user = await this.userStore.findById(userId);
    if (!user) {
      throw new UnauthorizedError();
    }
    await this.userStore.update({ ...user, securityStamp: newSecurityStamp() });
  }
}
