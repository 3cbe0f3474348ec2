import type { Request, Response, NextFunction } from 'express';
import type { TokenService } from '../../../application/identity/tokens.js';
import type { ErrorResponse } from './errorHandler.js';

export interface AuthRequest extends Request {
  userId?: string;
  userEmail?: string;
  userRoles?: string[];
}

function reject(res: Response, message: string): void {
  const body: ErrorResponse = { code: 'UNAUTHORIZED', message };
  res.status(401).set('WWW-Authenticate', 'Bearer').json(body);
}

/**
 * Require a valid bearer access token. Refresh tokens and emailed codes are
 * signed with the same key but are rejected here.
 */
export function authMiddleware(tokens: TokenService) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      reject(res, 'Missing or invalid authorization header');
      return;
    }

    const principal = tokens.verifyAccessToken(authHeader.substring(7).trim());
    if (!principal) {
      reject(res, 'Invalid or expired token');
      return;
    }

    req.userId = principal.userId;
    req.userEmail = principal.email;
    req.userRoles = principal.roles;
    next();
  };
}

/**
 * Read the caller id set by authMiddleware; a route mounted without it is a wiring bug.
 */
export function requireUserId(req: AuthRequest): string {
  if (!req.userId) {
    throw new Error('authMiddleware must run before this handler');
  }
  return req.userId;
}
