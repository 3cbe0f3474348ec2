/**
 * Application-level errors for HTTP layer mapping.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type UnauthorizedCode = 'UNAUTHORIZED' | 'LOCKED_OUT' | 'NOT_ALLOWED';

export class UnauthorizedError extends Error {
  constructor(
    message = 'Unauthorized',
    public readonly code: UnauthorizedCode = 'UNAUTHORIZED'
  ) {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
