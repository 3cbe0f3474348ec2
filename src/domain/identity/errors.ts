/**
 * A single identity failure: a stable code plus a human-readable description.
 */
export interface IdentityError {
  readonly code: string;
  readonly description: string;
}

export const IdentityErrors = {
  invalidEmail: (email: string): IdentityError => ({
    code: 'InvalidEmail',
    description: `Email '${email}' is invalid.`,
  }),
  invalidUserName: (userName: string): IdentityError => ({
    code: 'InvalidUserName',
    description: `Username '${userName}' is invalid, can only contain letters or digits.`,
  }),
  duplicateUserName: (userName: string): IdentityError => ({
    code: 'DuplicateUserName',
    description: `Username '${userName}' is already taken.`,
  }),
  invalidToken: (): IdentityError => ({
    code: 'InvalidToken',
    description: 'Invalid token.',
  }),
  passwordMismatch: (): IdentityError => ({
    code: 'PasswordMismatch',
    description: 'Incorrect password.',
  }),
  oldPasswordRequired: (): IdentityError => ({
    code: 'OldPasswordRequired',
    description:
      'The old password is required to set a new password. If the old password is forgotten, use /resetPassword.',
  }),
  passwordTooShort: (length: number): IdentityError => ({
    code: 'PasswordTooShort',
    description: `Passwords must be at least ${length} characters.`,
  }),
  passwordRequiresNonAlphanumeric: (): IdentityError => ({
    code: 'PasswordRequiresNonAlphanumeric',
    description: 'Passwords must have at least one non alphanumeric character.',
  }),
  passwordRequiresDigit: (): IdentityError => ({
    code: 'PasswordRequiresDigit',
    description: "Passwords must have at least one digit ('0'-'9').",
  }),
  passwordRequiresLower: (): IdentityError => ({
    code: 'PasswordRequiresLower',
    description: "Passwords must have at least one lowercase ('a'-'z').",
  }),
  passwordRequiresUpper: (): IdentityError => ({
    code: 'PasswordRequiresUpper',
    description: "Passwords must have at least one uppercase ('A'-'Z').",
  }),
  passwordRequiresUniqueChars: (uniqueChars: number): IdentityError => ({
    code: 'PasswordRequiresUniqueChars',
    description: `Passwords must use at least ${uniqueChars} different characters.`,
  }),
} as const;

/**
 * Thrown when an identity operation fails validation.
 * Carries every error collected, not just the first.
 */
export class IdentityResultError extends Error {
  constructor(public readonly errors: readonly IdentityError[]) {
    super(errors.map((e) => e.description).join(' '));
    this.name = 'IdentityResultError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Errors grouped by code, each with its descriptions. */
  toErrorMap(): Record<string, string[]> {
    const map: Record<string, string[]> = {};
    for (const error of this.errors) {
      (map[error.code] ??= []).push(error.description);
    }
    return map;
  }
}
