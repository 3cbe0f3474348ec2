import { describe, it, expect } from 'vitest';
import {
  changeEmail,
  changePasswordHash,
  createUser,
  isLockedOut,
  isValidEmail,
  normalizeKey,
  recordAccessFailure,
  resetAccessFailures,
  validateUserName,
} from '../user.js';

const lockout = { maxFailedAttempts: 3, durationSeconds: 60 };

describe('IdentityUser', () => {
  describe('createUser', () => {
    it('uses the email as user name and normalises both', () => {
      const now = new Date('2024-01-01T00:00:00Z');
      const user = createUser('Alice@Example.com', 'hash', now);

      expect(user.userName).toBe('Alice@Example.com');
      expect(user.normalizedUserName).toBe('ALICE@EXAMPLE.COM');
      expect(user.normalizedEmail).toBe('ALICE@EXAMPLE.COM');
      expect(user.emailConfirmed).toBe(false);
      expect(user.lockoutEnabled).toBe(true);
      expect(user.lockoutEnd).toBeNull();
      expect(user.accessFailedCount).toBe(0);
      expect(user.createdAt).toBe(now);
      expect(user.securityStamp).toMatch(/^[0-9A-F]{32}$/);
    });

    it('gives every user a distinct id and stamps', () => {
      const a = createUser('a@example.com', 'hash');
      const b = createUser('a@example.com', 'hash');
      expect(a.id).not.toBe(b.id);
      expect(a.securityStamp).not.toBe(b.securityStamp);
      expect(a.concurrencyStamp).not.toBe(b.concurrencyStamp);
    });
  });

  describe('isValidEmail', () => {
    it.each([
      ['user@example.com', true],
      ['a@b', true],
      ['no-at-sign', false],
      ['@example.com', false],
      ['user@', false],
      ['two@at@signs', false],
    ])('%s -> %s', (email, expected) => {
      expect(isValidEmail(email)).toBe(expected);
    });
  });

  describe('validateUserName', () => {
    it('accepts letters, digits and -._@+', () => {
      expect(validateUserName('a.b-c_d+e@example.com')).toEqual([]);
    });

    it('rejects other characters', () => {
      expect(validateUserName('john doe@example.com')).toEqual([
        {
          code: 'InvalidUserName',
          description: "Username 'john doe@example.com' is invalid, can only contain letters or digits.",
        },
      ]);
    });
  });

  describe('lockout', () => {
    const now = new Date('2024-01-01T12:00:00Z');

    it('counts failures until the limit, then locks and resets the counter', () => {
      let user = createUser('lock@example.com', 'hash');
      user = recordAccessFailure(user, lockout, now);
      user = recordAccessFailure(user, lockout, now);
      expect(user.accessFailedCount).toBe(2);
      expect(isLockedOut(user, now)).toBe(false);

      user = recordAccessFailure(user, lockout, now);
      expect(user.accessFailedCount).toBe(0);
      expect(user.lockoutEnd).toEqual(new Date('2024-01-01T12:01:00Z'));
      expect(isLockedOut(user, now)).toBe(true);
      expect(isLockedOut(user, new Date('2024-01-01T12:01:00Z'))).toBe(false);
    });

    it('leaves users with lockout disabled untouched', () => {
      const user = { ...createUser('free@example.com', 'hash'), lockoutEnabled: false };
      expect(recordAccessFailure(user, lockout, now)).toBe(user);
    });

    it('resetAccessFailures clears count and lockout end', () => {
      const user = {
        ...createUser('reset@example.com', 'hash'),
        accessFailedCount: 2,
        lockoutEnd: now,
      };
      const reset = resetAccessFailures(user);
      expect(reset.accessFailedCount).toBe(0);
      expect(reset.lockoutEnd).toBeNull();
    });
  });

  it('changeEmail moves user name and email together and confirms it', () => {
    const user = createUser('old@example.com', 'hash');
    const changed = changeEmail(user, 'New@example.com');

    expect(changed.userName).toBe('New@example.com');
    expect(changed.email).toBe('New@example.com');
    expect(changed.normalizedUserName).toBe(normalizeKey('New@example.com'));
    expect(changed.emailConfirmed).toBe(true);
    expect(changed.securityStamp).not.toBe(user.securityStamp);
  });

  it('changePasswordHash rotates the security stamp', () => {
    const user = createUser('pw@example.com', 'old-hash');
    const changed = changePasswordHash(user, 'new-hash');
    expect(changed.passwordHash).toBe('new-hash');
    expect(changed.securityStamp).not.toBe(user.securityStamp);
  });
});
