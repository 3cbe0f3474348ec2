import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { IdentityResultError } from '../../../domain/identity/errors.js';
import { ConcurrencyError } from '../../../application/identity/userStore.js';
import { NotFoundError, UnauthorizedError } from '../../../application/errors.js';
import type { Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

export const IDENTITY_VALIDATION_MESSAGE = 'One or more validation errors occurred.';

function toResponse(err: Error): { status: number; body: ErrorResponse } | null {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (err instanceof IdentityResultError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: IDENTITY_VALIDATION_MESSAGE,
        details: { errors: err.toErrorMap() },
      },
    };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: err.code, message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof ConcurrencyError) {
    return {
      status: 409,
      body: {
        code: 'CONCURRENCY_CONFLICT',
        message: err.message,
        details: { userId: err.userId },
      },
    };
  }

  return null;
}

export function errorHandler(logger: Logger) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const mapped = toResponse(err);
    if (mapped) {
      logger.debug({ err, method: req.method, path: req.path }, 'Request failed');
      if (mapped.status === 401) {
        res.set('WWW-Authenticate', 'Bearer');
      }
      res.status(mapped.status).json(mapped.body);
      return;
    }

    // express.json() rejects unparsable bodies with a 4xx status on the error
    if ('status' in err && err.status === 400 && 'type' in err && err.type === 'entity.parse.failed') {
      const body: ErrorResponse = { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' };
      res.status(400).json(body);
      return;
    }

    logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    const body: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(body);
  };
}
