import { env } from './config/env';
import { logger } from './config/logger';
import { getCatalog, reloadCatalog } from './config/catalog';
import { getScoringConfig } from './config/scoring';
import { createApp } from './app';

function main() {
  // Reference data is validated up front; a bad catalog or config stops the boot
  getCatalog();
  getScoringConfig();

  const app = createApp();
  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, `Server listening on :${env.PORT}`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.fatal(`Port ${env.PORT} is already in use. Please try a different port.`);
    } else {
      logger.fatal({ err }, 'Server error');
    }
    process.exit(1);
  });

  process.on('SIGHUP', () => {
    try {
      reloadCatalog();
    } catch (err) {
      logger.error({ err }, 'Catalog reload failed; keeping the previous catalog');
    }
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      logger.info('Process terminated');
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught Exception');
    server.close(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled Rejection');
    server.close(() => process.exit(1));
  });
}

try {
  main();
} catch (err) {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
}
