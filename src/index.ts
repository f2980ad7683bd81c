import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './utils/logger';

let isShuttingDown = false;

async function start() {
  try {
    const app = await buildApp(env);

    const created = await app.container.resolve('authService').ensureAdmin();
    if (created) {
      logger.warn({ username: env.ADMIN_USERNAME }, 'Seeded admin account from configuration; change its password');
    }

    await app.listen({
      port: env.PORT,
      host: env.HOST,
    });

    logger.info({ dataDir: env.DATA_DIR }, `Entry pass service running on port ${env.PORT}`);

    const gracefulShutdown = async (signal: string) => {
      if (isShuttingDown) {
        logger.warn({ signal }, 'Shutdown already in progress, ignoring signal');
        return;
      }
      isShuttingDown = true;
      logger.info(`${signal} received, shutting down gracefully...`);

      try {
        await app.close();
        logger.info('Server closed');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start entry pass service');
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught exception');
  process.exit(1);
});

void start();
