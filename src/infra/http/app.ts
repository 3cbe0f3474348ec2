import express from 'express';
import type { AppConfig } from '../../config.js';
import type { UserStore } from '../../application/identity/userStore.js';
import type { EmailSender } from '../../application/identity/emailSender.js';
import { TokenService } from '../../application/identity/tokens.js';
import type { Logger } from '../logger.js';
import { createIdentityRoutes } from './routes/identity.js';
import { createForecastRoutes } from './routes/forecast.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter, createLoginRateLimiter } from './middleware/rateLimit.js';

export interface AppDependencies {
  config: AppConfig;
  userStore: UserStore;
  emailSender: EmailSender;
  logger: Logger;
  /** Source of randomness for the sample forecast; Math.random by default. */
  random?: () => number;
}

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let id: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      id = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(id));
}

export function createApp(deps: AppDependencies): express.Application {
  const { config, userStore, emailSender, logger } = deps;
  const tokens = new TokenService({
    secret: config.jwtSecret,
    accessTokenTtlSeconds: config.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.refreshTokenTtlSeconds,
    emailTokenTtlSeconds: config.emailTokenTtlSeconds,
  });

  const app = express();
  app.use(express.json());
  app.use(createApiRateLimiter(config.apiRateLimitPerMinute));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(userStore.ping(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        logger.warn({ err }, 'Health check failed');
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes(config.identityPathPrefix));

  app.use(
    config.identityPathPrefix || '/',
    createIdentityRoutes({
      userStore,
      tokens,
      emailSender,
      signIn: {
        lockout: config.lockout,
        requireConfirmedEmail: config.requireConfirmedEmail,
      },
      publicBaseUrl: config.publicBaseUrl,
      identityPathPrefix: config.identityPathPrefix,
      loginRateLimiter: createLoginRateLimiter(config.loginRateLimitPerMinute),
    })
  );

  app.use(createForecastRoutes(tokens, deps.random));

  // Error handler (must be last)
  app.use(errorHandler(logger));

  return app;
}
