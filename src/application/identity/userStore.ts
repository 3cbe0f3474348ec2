import type { IdentityUser } from '../../domain/identity/user.js';
import type { LockoutOptions } from '../../config.js';

/**
 * Persistence port for identity users.
 *
 * `update` is optimistic: it succeeds only while the stored concurrency stamp
 * equals `user.concurrencyStamp`, and returns the record with a fresh stamp.
 * Implementations throw ConcurrencyError otherwise.
 *
 * The sign-in counters bypass that check: `recordAccessFailure` and
 * `resetAccessFailures` apply atomically to whatever is stored, so parallel
 * sign-ins never conflict and every failure is counted. Both resolve to null
 * when the user no longer exists.
 */
export interface UserStore {
  findById(id: string): Promise<IdentityUser | null>;
  findByNormalizedUserName(normalizedUserName: string): Promise<IdentityUser | null>;
  findByNormalizedEmail(normalizedEmail: string): Promise<IdentityUser | null>;
  create(user: IdentityUser): Promise<IdentityUser>;
  update(user: IdentityUser): Promise<IdentityUser>;
  recordAccessFailure(userId: string, lockout: LockoutOptions, now?: Date): Promise<IdentityUser | null>;
  resetAccessFailures(userId: string): Promise<IdentityUser | null>;
  getRoleNames(userId: string): Promise<string[]>;
  ping(): Promise<void>;
}

export class ConcurrencyError extends Error {
  constructor(
    public readonly userId: string,
    public readonly expectedStamp: string
  ) {
    super('Optimistic concurrency failure, object has been modified.');
    this.name = 'ConcurrencyError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
