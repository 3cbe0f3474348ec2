import { randomUUID } from 'crypto';
import type { DbPool } from './pool.js';
import type { IdentityUser } from '../../domain/identity/user.js';
import type { LockoutOptions } from '../../config.js';
import { IdentityErrors, IdentityResultError } from '../../domain/identity/errors.js';
import { ConcurrencyError, type UserStore } from '../../application/identity/userStore.js';

interface UserRow {
  id: string;
  user_name: string;
  normalized_user_name: string;
  email: string;
  normalized_email: string;
  email_confirmed: boolean;
  password_hash: string;
  security_stamp: string;
  concurrency_stamp: string;
  lockout_enabled: boolean;
  lockout_end: Date | null;
  access_failed_count: number;
  created_at: Date;
}

const USER_COLUMNS = `id, user_name, normalized_user_name, email, normalized_email,
  email_confirmed, password_hash, security_stamp, concurrency_stamp,
  lockout_enabled, lockout_end, access_failed_count, created_at`;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): IdentityUser {
  return {
    id: row.id,
    userName: row.user_name,
    normalizedUserName: row.normalized_user_name,
    email: row.email,
    normalizedEmail: row.normalized_email,
    emailConfirmed: row.email_confirmed,
    passwordHash: row.password_hash,
    securityStamp: row.security_stamp,
    concurrencyStamp: row.concurrency_stamp,
    lockoutEnabled: row.lockout_enabled,
    lockoutEnd: row.lockout_end,
    accessFailedCount: row.access_failed_count,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class PgUserStore implements UserStore {
  constructor(private pool: DbPool) {}

  async findById(id: string): Promise<IdentityUser | null> {
    // ids come from query strings too; anything that is not a uuid cannot match
    if (!UUID_PATTERN.test(id)) {
      return null;
    }
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findByNormalizedUserName(normalizedUserName: string): Promise<IdentityUser | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE normalized_user_name = $1`,
      [normalizedUserName]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findByNormalizedEmail(normalizedEmail: string): Promise<IdentityUser | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE normalized_email = $1
       ORDER BY created_at LIMIT 1`,
      [normalizedEmail]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async create(user: IdentityUser): Promise<IdentityUser> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (${USER_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
         RETURNING ${USER_COLUMNS}`,
        [
          user.id,
          user.userName,
          user.normalizedUserName,
          user.email,
          user.normalizedEmail,
          user.emailConfirmed,
          user.passwordHash,
          user.securityStamp,
          user.concurrencyStamp,
          user.lockoutEnabled,
          user.lockoutEnd,
          user.accessFailedCount,
          user.createdAt,
        ]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      // Lost a race against a concurrent registration of the same name
      if (isUniqueViolation(error)) {
        throw new IdentityResultError([IdentityErrors.duplicateUserName(user.userName)]);
      }
      throw error;
    }
  }

  async update(user: IdentityUser): Promise<IdentityUser> {
    try {
      const result = await this.pool.query<UserRow>(
        `UPDATE users SET
           user_name = $3,
           normalized_user_name = $4,
           email = $5,
           normalized_email = $6,
           email_confirmed = $7,
           password_hash = $8,
           security_stamp = $9,
           concurrency_stamp = $10,
           lockout_enabled = $11,
           lockout_end = $12,
           access_failed_count = $13
         WHERE id = $1 AND concurrency_stamp = $2
         RETURNING ${USER_COLUMNS}`,
        [
          user.id,
          user.concurrencyStamp,
          user.userName,
          user.normalizedUserName,
          user.email,
          user.normalizedEmail,
          user.emailConfirmed,
          user.passwordHash,
          user.securityStamp,
          randomUUID(),
          user.lockoutEnabled,
          user.lockoutEnd,
          user.accessFailedCount,
        ]
      );

      const row = result.rows[0];
      if (!row) {
        throw new ConcurrencyError(user.id, user.concurrencyStamp);
      }
      return toUser(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new IdentityResultError([IdentityErrors.duplicateUserName(user.userName)]);
      }
      throw error;
    }
  }

  async recordAccessFailure(userId: string, lockout: LockoutOptions, now = new Date()): Promise<IdentityUser | null> {
    // Every SET expression sees the pre-update row, so the increment and the
    // lock decision are taken from the same count
    const result = await this.pool.query<UserRow>(
      `UPDATE users SET
         access_failed_count = CASE WHEN access_failed_count + 1 >= $2 THEN 0 ELSE access_failed_count + 1 END,
         lockout_end = CASE WHEN access_failed_count + 1 >= $2 THEN $3 ELSE lockout_end END,
         concurrency_stamp = $4
       WHERE id = $1 AND lockout_enabled
       RETURNING ${USER_COLUMNS}`,
      [userId, lockout.maxFailedAttempts, new Date(now.getTime() + lockout.durationSeconds * 1000), randomUUID()]
    );
    const row = result.rows[0];
    return row ? toUser(row) : this.findById(userId);
  }

  async resetAccessFailures(userId: string): Promise<IdentityUser | null> {
    const result = await this.pool.query<UserRow>(
      `UPDATE users SET access_failed_count = 0, lockout_end = NULL, concurrency_stamp = $2
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [userId, randomUUID()]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async getRoleNames(userId: string): Promise<string[]> {
    const result = await this.pool.query<{ name: string }>(
      `SELECT r.name
       FROM roles r
       JOIN user_roles ur ON ur.role_id = r.id
       WHERE ur.user_id = $1
       ORDER BY r.name`,
      [userId]
    );
    return result.rows.map((row) => row.name);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
