import { env, validateEnv, websocketConfig } from '@/shared/config';
import { logger } from '@/shared/utils';
import { errorMessage } from '@/shared/errors';
import { createAppServer } from './server';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', { error: errorMessage(error) });
  process.exit(1);
}

const server = createAppServer();
const { httpServer } = server;

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  // Force exit if a socket refuses to close
  const forceExit = setTimeout(() => {
    logger.warn('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 10000);
  forceExit.unref();

  try {
    await server.close();
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, () => {
  logger.info('Companion backend server started', {
    port: env.PORT,
    environment: env.NODE_ENV,
    websocketPath: websocketConfig.path,
  });
});
