/**
 * Health Check Routes
 * @module routes/health
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { HealthCheckSchema, type HealthCheck } from './schemas/common.js';

/**
 * Application start time for uptime calculation
 */
const startTime = Date.now();

function getVersion(): string {
  return process.env.APP_VERSION || process.env.npm_package_version || '0.1.0';
}

/**
 * Uptime in whole seconds
 */
function getUptime(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

const healthRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  /**
   * GET /health
   */
  fastify.get<{ Reply: HealthCheck }>(
    '/health',
    {
      schema: {
        tags: ['Health'],
        response: {
          200: HealthCheckSchema,
        },
      },
    },
    async (_request, reply) => {
      const health: HealthCheck = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: getVersion(),
        uptime: getUptime(),
      };

      return reply.status(200).send(health);
    }
  );
};

export default healthRoutes;
