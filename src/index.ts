import { createApp } from './app';
import { env, matcherDefaults } from './config';
import { logger, Logging } from './utils';

/**
 * Start the server
 */
const startServer = (): void => {
  const app = createApp();

  const server = app.listen(env.PORT, () => {
    Logging.box('🔤 NAME RECONCILER', [
      `Server started in ${env.NODE_ENV} mode`,
      `Weights ngram/prefix/edit: ${matcherDefaults.ngramWeight}/${matcherDefaults.prefixWeight}/${matcherDefaults.editWeight}`,
      `Top ${matcherDefaults.topN}, threshold ${matcherDefaults.minScoreThreshold}`,
    ]);
    Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
    Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
    Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
  });

  // Graceful shutdown handlers
  const gracefulShutdown = (signal: string): void => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close((err) => {
      if (err) {
        logger.error(`Error during server shutdown: ${err.message}`);
        process.exit(1);
      }

      logger.info('Server closed successfully');
      process.exit(0);
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown due to timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (err: Error) => {
    logger.error(`Uncaught Exception: ${err.stack ?? err.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error(`Unhandled Rejection: ${String(reason)}`);
    process.exit(1);
  });
};

startServer();
