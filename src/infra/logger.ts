import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Paths redacted from every log line: credentials and bearer material.
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'authorization',
  'password',
  'newPassword',
  'oldPassword',
  'token',
  'accessToken',
  'refreshToken',
  'resetCode',
  'code',
];

/**
 * Create a structured pino logger.
 * A destination stream may be passed to capture output (tests do this).
 */
export function createLogger(
  options: LoggerOptions = {},
  destination?: DestinationStream
): Logger {
  const merged: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };
  return destination ? pino(merged, destination) : pino(merged);
}
