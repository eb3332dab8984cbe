/**
 * Fastify Application Factory
 * @module app
 */

import Fastify, { FastifyInstance } from 'fastify';
import { getConfig } from './config/index.js';
import { createModuleLogger } from './logging/index.js';
import errorHandler, { ErrorHandlerOptions } from './middleware/error-handler.js';
import routes from './routes/index.js';
import { ClusterConfigService } from './services/cluster-config-service.js';

/**
 * Application configuration options
 */
export interface AppOptions {
  /**
   * Maximum request body size in bytes
   * @default server.bodyLimit from the engine config
   */
  bodyLimit?: number;

  /**
   * Fastify request logging
   * @default true
   */
  requestLogging?: boolean;

  /** Service used by the config routes; built from the engine config when omitted */
  service?: ClusterConfigService;

  errorHandler?: ErrorHandlerOptions;
}

/**
 * Create and configure Fastify application instance
 */
export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();
  const logger = createModuleLogger('app-factory');

  const app = Fastify({
    logger: opts.requestLogging === false
      ? false
      : { level: config.logging.level, name: 'http' },
    bodyLimit: opts.bodyLimit ?? config.server.bodyLimit,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  // Register error handler (must be before routes)
  await app.register(errorHandler, opts.errorHandler ?? {});
  logger.debug('Error handler registered');

  const service = opts.service ?? new ClusterConfigService({
    validation: config.validation,
    concurrency: config.template.renderConcurrency,
  });
  await app.register(routes, { service });
  logger.debug('Routes registered');

  app.addHook('onClose', async () => {
    logger.info('Application closing...');
  });

  return app;
}

/**
 * Create application for testing (request logging off)
 */
export async function buildTestApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  return buildApp({
    ...opts,
    requestLogging: false,
    errorHandler: { logErrors: false, ...opts.errorHandler },
  });
}

export default buildApp;
