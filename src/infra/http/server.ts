import { loadConfig } from '../../config.js';
import { LoggingEmailSender } from '../../application/identity/emailSender.js';
import { createLogger } from '../logger.js';
import { createPool } from '../db/pool.js';
import { PgUserStore } from '../db/userRepo.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  let logger = createLogger();
  try {
    const config = loadConfig();
    logger = createLogger({ level: config.logLevel });

    const pool = createPool(config.databaseUrl, logger);
    const userStore = new PgUserStore(pool);

    // An unreachable database ends startup here
    await userStore.ping();

    const app = createApp({
      config,
      userStore,
      emailSender: new LoggingEmailSender(logger),
      logger,
    });

    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, identity: config.identityPathPrefix || '/', docs: '/docs' },
        `Server running on http://localhost:${config.port}`
      );
    });

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      server.close(() => {
        pool.end().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err }, 'Failed to close database pool');
            process.exit(1);
          }
        );
      });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    logger.fatal({ err: error }, 'Startup failed');
    process.exit(1);
  }
}

void main();
