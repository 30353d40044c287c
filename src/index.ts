import { config } from './config.js';
import logger from './utils/logger.js';
import { createApplication } from './app.js';

logger.level = config.debug && !process.env.LOG_LEVEL ? 'debug' : config.logLevel;

// Global error handlers to prevent silent crashes
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.stack || error.message}`);
});
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${String(reason)}`);
});

logger.info(`Starting golf voice assistant (${config.environment})`);

const app = createApplication(config);

const shutdown = async (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  await app.stop();
  process.exit(0);
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

app
  .checkProviders()
  .then(() => app.server.start())
  .catch((error: unknown) => {
    logger.error(`Failed to start server: ${String(error)}`);
    process.exit(1);
  });
