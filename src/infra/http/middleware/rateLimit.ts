import rateLimit from 'express-rate-limit';
import type { ErrorResponse } from './errorHandler.js';

const WINDOW_MS = 60 * 1000;

function limiter(limit: number, message: string) {
  const body: ErrorResponse = { code: 'RATE_LIMITED', message };
  return rateLimit({
    windowMs: WINDOW_MS,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    // In-memory store: counters reset on restart and are per app instance
    keyGenerator: (req) => req.ip || req.socket.remoteAddress || 'unknown',
    handler: (_req, res) => {
      res.status(429).json(body);
    },
  });
}

/** General API limiter, per IP. */
export function createApiRateLimiter(perMinute: number) {
  return limiter(perMinute, 'Too many requests, please try again later.');
}

/** Stricter limiter for the login endpoint, per IP. */
export function createLoginRateLimiter(perMinute: number) {
  return limiter(perMinute, 'Too many login attempts, please try again later.');
}
