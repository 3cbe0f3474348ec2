import { randomUUID } from 'crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { IdentityUser } from '../../domain/identity/user.js';

export interface AccessTokenResponse {
  tokenType: 'Bearer';
  accessToken: string;
  expiresIn: number;
  refreshToken: string;
}

export interface AuthenticatedPrincipal {
  userId: string;
  email: string;
  roles: string[];
}

export interface RefreshTokenClaims {
  userId: string;
  securityStamp: string;
}

export type EmailTokenPurpose = 'EmailConfirmation' | 'ChangeEmail' | 'ResetPassword';

export interface TokenServiceOptions {
  secret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  emailTokenTtlSeconds: number;
}

const accessClaimsSchema = z.object({
  typ: z.literal('access'),
  sub: z.string(),
  email: z.string(),
  roles: z.array(z.string()),
});

const refreshClaimsSchema = z.object({
  typ: z.literal('refresh'),
  sub: z.string(),
  stamp: z.string(),
});

const emailClaimsSchema = z.object({
  typ: z.literal('email'),
  sub: z.string(),
  purpose: z.enum(['EmailConfirmation', 'ChangeEmail', 'ResetPassword']),
  stamp: z.string(),
  target: z.string().optional(),
});

/**
 * Issues and validates the three kinds of signed tokens the identity API hands out:
 * bearer access tokens, refresh tokens bound to the security stamp, and emailed codes.
 *
 * Every token carries a random `jti`, so two tokens issued for the same user
 * within the same second still differ.
 */
export class TokenService {
  constructor(private options: TokenServiceOptions) {}

  issueTokenPair(user: IdentityUser, roles: string[]): AccessTokenResponse {
    const accessToken = this.sign(
      { typ: 'access', sub: user.id, email: user.email, roles },
      this.options.accessTokenTtlSeconds
    );
    const refreshToken = this.sign(
      { typ: 'refresh', sub: user.id, stamp: user.securityStamp },
      this.options.refreshTokenTtlSeconds
    );
    return {
      tokenType: 'Bearer',
      accessToken,
      expiresIn: this.options.accessTokenTtlSeconds,
      refreshToken,
    };
  }

  verifyAccessToken(token: string): AuthenticatedPrincipal | null {
    const claims = accessClaimsSchema.safeParse(this.decode(token));
    if (!claims.success) {
      return null;
    }
    return { userId: claims.data.sub, email: claims.data.email, roles: claims.data.roles };
  }

  verifyRefreshToken(token: string): RefreshTokenClaims | null {
    const claims = refreshClaimsSchema.safeParse(this.decode(token));
    if (!claims.success) {
      return null;
    }
    return { userId: claims.data.sub, securityStamp: claims.data.stamp };
  }

  /**
   * Code for an emailed link or reset flow. `target` binds a ChangeEmail code
   * to the address it was sent to.
   */
  generateEmailToken(user: IdentityUser, purpose: EmailTokenPurpose, target?: string): string {
    return this.sign(
      { typ: 'email', sub: user.id, purpose, stamp: user.securityStamp, ...(target ? { target } : {}) },
      this.options.emailTokenTtlSeconds
    );
  }

  verifyEmailToken(
    user: IdentityUser,
    purpose: EmailTokenPurpose,
    token: string,
    target?: string
  ): boolean {
    const claims = emailClaimsSchema.safeParse(this.decode(token));
    return (
      claims.success &&
      claims.data.sub === user.id &&
      claims.data.purpose === purpose &&
      claims.data.stamp === user.securityStamp &&
      claims.data.target === target
    );
  }

  private sign(payload: Record<string, unknown>, ttlSeconds: number): string {
    return jwt.sign(payload, this.options.secret, {
      expiresIn: ttlSeconds,
      jwtid: randomUUID(),
    });
  }

  private decode(token: string): unknown {
    try {
      return jwt.verify(token, this.options.secret);
    } catch {
      // bad signature, malformed or expired
      return null;
    }
  }
}
