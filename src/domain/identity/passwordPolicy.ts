import { IdentityErrors, type IdentityError } from './errors.js';

export interface PasswordPolicy {
  requiredLength: number;
  requiredUniqueChars: number;
  requireNonAlphanumeric: boolean;
  requireDigit: boolean;
  requireLowercase: boolean;
  requireUppercase: boolean;
}

export const DEFAULT_PASSWORD_POLICY: PasswordPolicy = {
  requiredLength: 6,
  requiredUniqueChars: 1,
  requireNonAlphanumeric: true,
  requireDigit: true,
  requireLowercase: true,
  requireUppercase: true,
};

const isDigit = (c: string) => c >= '0' && c <= '9';
const isLower = (c: string) => c >= 'a' && c <= 'z';
const isUpper = (c: string) => c >= 'A' && c <= 'Z';
const isLetterOrDigit = (c: string) => isDigit(c) || isLower(c) || isUpper(c);

/**
 * Check a candidate password against the policy.
 * Returns every violation in a fixed order; an empty array means valid.
 */
export function validatePassword(
  password: string,
  policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY
): IdentityError[] {
  const errors: IdentityError[] = [];
  // UTF-16 code units, so a surrogate pair counts as two characters
  const chars = password.split('');

  if (password.length < policy.requiredLength) {
    errors.push(IdentityErrors.passwordTooShort(policy.requiredLength));
  }
  if (policy.requireNonAlphanumeric && chars.every(isLetterOrDigit)) {
    errors.push(IdentityErrors.passwordRequiresNonAlphanumeric());
  }
  if (policy.requireDigit && !chars.some(isDigit)) {
    errors.push(IdentityErrors.passwordRequiresDigit());
  }
  if (policy.requireLowercase && !chars.some(isLower)) {
    errors.push(IdentityErrors.passwordRequiresLower());
  }
  if (policy.requireUppercase && !chars.some(isUpper)) {
    errors.push(IdentityErrors.passwordRequiresUpper());
  }
  if (policy.requiredUniqueChars >= 1 && new Set(chars).size < policy.requiredUniqueChars) {
    errors.push(IdentityErrors.passwordRequiresUniqueChars(policy.requiredUniqueChars));
  }

  return errors;
}
