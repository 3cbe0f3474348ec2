import { describe, it, expect } from 'vitest';
import { DEFAULT_PASSWORD_POLICY, validatePassword } from '../passwordPolicy.js';

const codes = (password: string, policy = DEFAULT_PASSWORD_POLICY) =>
  validatePassword(password, policy).map((e) => e.code);

describe('validatePassword', () => {
  it('accepts a password meeting every default rule', () => {
    expect(validatePassword('Passw0rd!')).toEqual([]);
  });

  it('reports every violation in a fixed order', () => {
    expect(codes('abc')).toEqual([
      'PasswordTooShort',
      'PasswordRequiresNonAlphanumeric',
      'PasswordRequiresDigit',
      'PasswordRequiresUpper',
    ]);
  });

  it('reports all six rules for an empty password', () => {
    expect(codes('')).toEqual([
      'PasswordTooShort',
      'PasswordRequiresNonAlphanumeric',
      'PasswordRequiresDigit',
      'PasswordRequiresLower',
      'PasswordRequiresUpper',
      'PasswordRequiresUniqueChars',
    ]);
  });

  it('includes the required length in the description', () => {
    const [error] = validatePassword('Aa1!');
    expect(error).toEqual({
      code: 'PasswordTooShort',
      description: 'Passwords must be at least 6 characters.',
    });
  });

  it('counts length in UTF-16 code units', () => {
    // the emoji is a surrogate pair: five code points, six units
    expect(validatePassword('Ab1!\u{1F600}')).toEqual([]);
    expect(codes('Ab1!\u00e9')).toEqual(['PasswordTooShort']);
  });

  it('only counts ASCII letters and digits as alphanumeric', () => {
    expect(validatePassword('Pässw0rd')).toEqual([]);
  });

  it('flags a single missing class', () => {
    expect(codes('password1!')).toEqual(['PasswordRequiresUpper']);
    expect(codes('PASSWORD1!')).toEqual(['PasswordRequiresLower']);
    expect(codes('Password!')).toEqual(['PasswordRequiresDigit']);
    expect(codes('Password1')).toEqual(['PasswordRequiresNonAlphanumeric']);
  });

  it('honours a custom policy', () => {
    const policy = {
      requiredLength: 1,
      requiredUniqueChars: 4,
      requireNonAlphanumeric: false,
      requireDigit: false,
      requireLowercase: false,
      requireUppercase: false,
    };
    expect(validatePassword('aaab', policy)).toEqual([
      {
        code: 'PasswordRequiresUniqueChars',
        description: 'Passwords must use at least 4 different characters.',
      },
    ]);
    expect(validatePassword('abcd', policy)).toEqual([]);
  });
});
