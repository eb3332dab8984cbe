/**
 * Server Entry Point
 * @module server
 */

import { buildApp } from './app.js';
import { initConfig } from './config/index.js';
import { initLogger } from './logging/index.js';

/**
 * Start the server
 */
async function start(): Promise<void> {
  const config = await initConfig();
  const logger = initLogger(
    { level: config.logging.level, pretty: config.logging.pretty },
    { service: 'server' }
  );

  const app = await buildApp();

  /**
   * Graceful shutdown handler
   */
  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await app.close();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void gracefulShutdown('unhandledRejection');
  });

  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info(
    { host: config.server.host, port: config.server.port },
    `Server listening on http://${config.server.host}:${config.server.port}`
  );
}

start().catch((error: unknown) => {
  // The logger may not exist yet when configuration fails
  process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
