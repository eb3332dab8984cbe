/**
 * Config Routes
 * @module routes/configs
 *
 * REST API endpoints for rendering templates and validating resolved
 * configurations.
 *
 * Endpoints:
 * - POST /v1/templates/render - Render a template (built-in when omitted)
 * - POST /v1/configs/validate - Validate resolved configuration text
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { ClusterConfigService } from '../services/cluster-config-service.js';
import { toSectionMap } from '../resolution/config-writer.js';
import type { ResolvedConfig } from '../resolution/types.js';
import type { ValidationReport } from '../validation/types.js';
import { ErrorResponseSchema } from './schemas/common.js';
import {
  RenderRequestSchema,
  RenderResponseSchema,
  ValidateRequestSchema,
  ValidateResponseSchema,
  type RenderRequestBody,
  type RenderResponse,
  type ValidateRequestBody,
  type ValidateResponse,
} from './schemas/configs.js';

export interface ConfigRoutesOptions {
  service?: ClusterConfigService;
}

function reportBody(report: ValidationReport): RenderResponse['report'] {
  return {
    valid: report.valid,
    errors: [...report.errors],
    warnings: [...report.warnings],
    references: [...report.references],
  };
}

function activeClusterName(config: ResolvedConfig): string | null {
  return config.activeCluster ? config.sections[config.activeCluster.index].name : null;
}

const configRoutes: FastifyPluginAsync<ConfigRoutesOptions> = async (
  fastify: FastifyInstance,
  options: ConfigRoutesOptions
): Promise<void> => {
  const service = options.service ?? new ClusterConfigService();

  /**
   * POST /v1/templates/render
   */
  fastify.post<{
    Body: RenderRequestBody;
  }>('/templates/render', {
    schema: {
      description: 'Render a cluster configuration template',
      tags: ['Templates'],
      body: RenderRequestSchema,
      response: {
        200: RenderResponseSchema,
        400: ErrorResponseSchema,
        422: ErrorResponseSchema,
      },
    },
  }, async (request): Promise<RenderResponse> => {
    const { template, variables } = request.body;
    const outcome = service.render({ template, variables });

    // Bind and assemble errors map to 422 through the error handler
    if (outcome.status !== 'resolved') {
      throw outcome.error;
    }

    return {
      text: outcome.text,
      sections: toSectionMap(outcome.config),
      activeCluster: activeClusterName(outcome.config),
      report: reportBody(outcome.report),
    };
  });

  /**
   * POST /v1/configs/validate
   */
  fastify.post<{
    Body: ValidateRequestBody;
  }>('/configs/validate', {
    schema: {
      description: 'Validate a resolved cluster configuration',
      tags: ['Configs'],
      body: ValidateRequestSchema,
      response: {
        200: ValidateResponseSchema,
        400: ErrorResponseSchema,
        422: ErrorResponseSchema,
      },
    },
  }, async (request): Promise<ValidateResponse> => {
    const outcome = service.validateText(request.body.config);
    if (outcome.status !== 'validated') {
      throw outcome.error;
    }

    return {
      sections: toSectionMap(outcome.config),
      activeCluster: activeClusterName(outcome.config),
      report: reportBody(outcome.report),
    };
  });
};

export default configRoutes;
