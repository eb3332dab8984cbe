/**
 * Route Registration
 * @module routes
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { ClusterConfigService } from '../services/cluster-config-service.js';
import healthRoutes from './health.js';
import configRoutes from './configs.js';

export interface RoutesOptions {
  service?: ClusterConfigService;
}

const routes: FastifyPluginAsync<RoutesOptions> = async (
  fastify: FastifyInstance,
  options: RoutesOptions
): Promise<void> => {
  // GET /health
  await fastify.register(healthRoutes);

  // POST /v1/templates/render
  // POST /v1/configs/validate
  await fastify.register(configRoutes, { prefix: '/v1', service: options.service });
};

export default routes;
