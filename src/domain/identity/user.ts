import { randomUUID } from 'crypto';
import { IdentityErrors, type IdentityError } from './errors.js';

/**
 * Persisted user record. Registration uses the email as user name.
 */
export interface IdentityUser {
  readonly id: string;
  readonly userName: string;
  readonly normalizedUserName: string;
  readonly email: string;
  readonly normalizedEmail: string;
  readonly emailConfirmed: boolean;
  readonly passwordHash: string;
  readonly securityStamp: string;
  readonly concurrencyStamp: string;
  readonly lockoutEnabled: boolean;
  readonly lockoutEnd: Date | null;
  readonly accessFailedCount: number;
  readonly createdAt: Date;
}

const ALLOWED_USER_NAME_CHARS = /^[A-Za-z0-9\-._@+]+$/;

export function normalizeKey(value: string): string {
  return value.toUpperCase();
}

/**
 * Loose email check: exactly one '@' that is neither the first nor the last character.
 */
export function isValidEmail(email: string): boolean {
  const at = email.indexOf('@');
  return at > 0 && at === email.lastIndexOf('@') && at !== email.length - 1;
}

export function validateUserName(userName: string): IdentityError[] {
  return ALLOWED_USER_NAME_CHARS.test(userName) ? [] : [IdentityErrors.invalidUserName(userName)];
}

/** Stamp that invalidates outstanding refresh tokens and emailed codes when replaced. */
export function newSecurityStamp(): string {
  return randomUUID().replace(/-/g, '').toUpperCase();
}

export function createUser(email: string, passwordHash: string, now = new Date()): IdentityUser {
  return {
    id: randomUUID(),
    userName: email,
    normalizedUserName: normalizeKey(email),
    email,
    normalizedEmail: normalizeKey(email),
    emailConfirmed: false,
    passwordHash,
    securityStamp: newSecurityStamp(),
    concurrencyStamp: randomUUID(),
    lockoutEnabled: true,
    lockoutEnd: null,
    accessFailedCount: 0,
    createdAt: now,
  };
}

export function isLockedOut(user: IdentityUser, now = new Date()): boolean {
  return user.lockoutEnabled && user.lockoutEnd !== null && user.lockoutEnd.getTime() > now.getTime();
}

/**
 * Count a failed sign-in. Reaching the limit locks the account and resets the counter.
 */
export function recordAccessFailure(
  user: IdentityUser,
  lockout: { maxFailedAttempts: number; durationSeconds: number },
  now = new Date()
): IdentityUser {
  if (!user.lockoutEnabled) {
    return user;
  }
  const count = user.accessFailedCount + 1;
  if (count < lockout.maxFailedAttempts) {
    return { ...user, accessFailedCount: count };
  }
  return {
    ...user,
    accessFailedCount: 0,
    lockoutEnd: new Date(now.getTime() + lockout.durationSeconds * 1000),
  };
}

export function resetAccessFailures(user: IdentityUser): IdentityUser {
  return { ...user, accessFailedCount: 0, lockoutEnd: null };
}

export function changeEmail(user: IdentityUser, email: string): IdentityUser {
  return {
    ...user,
    userName: email,
    normalizedUserName: normalizeKey(email),
    email,
    normalizedEmail: normalizeKey(email),
    emailConfirmed: true,
    securityStamp: newSecurityStamp(),
  };
}

export function changePasswordHash(user: IdentityUser, passwordHash: string): IdentityUser {
  return { ...user, passwordHash, securityStamp: newSecurityStamp() };
}
