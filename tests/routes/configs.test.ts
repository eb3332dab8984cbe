/**
 * Config Route Tests
 * @module tests/routes/configs.test
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildTestApp } from '../../src/app.js';
import { ClusterConfigService } from '../../src/services/cluster-config-service.js';

const variables = {
  region: 'eu-west-1',
  os: 'centos7',
  key_name: 'ops',
  instance: 'm5.large',
  scheduler: 'sge',
  bucket_name: 'cluster-scripts',
  vpc_id: 'vpc-12345678',
  public_subnet_id: 'subnet-12345678',
  private_subnet_id: 'subnet-87654321',
};

describe('Config Routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  // ==========================================================================
  // POST /v1/templates/render
  // ==========================================================================

  describe('POST /v1/templates/render', () => {
    it('should render the packaged template', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/templates/render',
        payload: { variables },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.activeCluster).toBe('cluster default');
      expect(body.report.valid).toBe(true);
      expect(body.sections.aws).toEqual({ aws_region_name: 'eu-west-1' });
      expect(body.sections['cluster default'].s3_read_resource).toBe('arn:aws:s3:::cluster-scripts/scripts/*');
      expect(body.text.startsWith('[global]\ncluster_template = default\n')).toBe(true);
    });

    it('should render an inline template', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/templates/render',
        payload: { template: '[aws]\naws_region_name = {{ region }}\n', variables: { region: 'us-west-2' } },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.text).toBe('[aws]\naws_region_name = us-west-2\n');
      expect(body.activeCluster).toBeNull();
      expect(body.report.errors.map((e: { rule: string }) => e.rule)).toEqual(['CC001']);
    });

    it('should return 422 for a missing variable', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/templates/render',
        payload: { variables: { region: 'eu-west-1' } },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toMatchObject({
        statusCode: 422,
        error: 'Unprocessable Entity',
        code: 'MISSING_REQUIRED_VARIABLE',
        message: 'Missing required variable: os',
        details: { kind: 'MissingRequired', variable: 'os' },
      });
    });

    it('should return 422 with the template location for an assembly error', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/templates/render',
        payload: { template: '[aws]\n{% if region %}\n', variables: { region: 'eu-west-1' } },
      });

      expect(response.statusCode).toBe(422);
      const body = response.json();
      expect(body.code).toBe('TEMPLATE_UNTERMINATED_CONDITIONAL');
      expect(body.details).toMatchObject({ kind: 'UnterminatedConditional', line: 2, source: '<inline>' });
    });

    it('should return 400 when variables are missing from the body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/templates/render',
        payload: { template: '[aws]' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION_ERROR');
    });

    it('should return 400 when a variable value is not a string', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/templates/render',
        payload: { variables: { region: { name: 'eu-west-1' } } },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  // ==========================================================================
  // POST /v1/configs/validate
  // ==========================================================================

  describe('POST /v1/configs/validate', () => {
    it('should return the report for a resolved configuration', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/configs/validate',
        payload: { config: '[global]\ncluster_template = hpc\n\n[aws]\naws_region_name = us-east-1\n' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        sections: { global: { cluster_template: 'hpc' }, aws: { aws_region_name: 'us-east-1' } },
        activeCluster: null,
        report: {
          valid: false,
          errors: [
            {
              kind: 'reference',
              rule: 'CC001',
              section: 'global',
              field: 'cluster_template',
              message: "cluster_template 'hpc' does not name an existing [cluster hpc] section",
              value: 'hpc',
              expected: 'cluster hpc',
            },
          ],
          warnings: [],
          references: [],
        },
      });
    });

    it('should return 422 for a leftover marker', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/configs/validate',
        payload: { config: '[aws]\naws_region_name = {{ region }}\n' },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().code).toBe('TEMPLATE_UNBOUND_PLACEHOLDER');
    });
  });

  describe('unknown routes', () => {
    it('should return 404 with ROUTE_NOT_FOUND', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/nothing' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        statusCode: 404,
        code: 'ROUTE_NOT_FOUND',
        message: 'Route GET /v1/nothing not found',
      });
    });
  });
});

describe('Config Routes with an injected service', () => {
  it('should use the service validation options', async () => {
    const app = await buildTestApp({
      service: new ClusterConfigService({ validation: { disabledRules: ['CC001', 'CC010'] } }),
    });

    const response = await app.inject({
      method: 'POST',
      url: '/v1/configs/validate',
      payload: { config: '[global]\ncluster_template = hpc\n' },
    });
    await app.close();

    expect(response.statusCode).toBe(200);
    expect(response.json().report).toEqual({ valid: true, errors: [], warnings: [], references: [] });
  });

  it('should reject bodies above the configured limit', async () => {
    const app = await buildTestApp({ bodyLimit: 1024 });

    const response = await app.inject({
      method: 'POST',
      url: '/v1/configs/validate',
      payload: { config: `[global]\n${'x'.repeat(2048)}` },
    });
    await app.close();

    expect(response.statusCode).toBe(413);
    expect(response.json().code).toBe('PAYLOAD_TOO_LARGE');
  });
});
