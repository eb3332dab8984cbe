/**
 * Health Route Tests
 * @module tests/health
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildTestApp } from '../src/app.js';

describe('Health Routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('should return healthy status', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health',
      });

      expect(response.statusCode).toBe(200);

      const body = response.json();
      expect(body.status).toBe('healthy');
      expect(typeof body.version).toBe('string');
      expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
    });

    it('should report a non-negative whole-second uptime', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health',
      });

      const { uptime } = response.json();
      expect(Number.isInteger(uptime)).toBe(true);
      expect(uptime).toBeGreaterThanOrEqual(0);
    });

    it('should echo the x-request-id header into error responses', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/healthz',
        headers: { 'x-request-id': 'req-123' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().requestId).toBe('req-123');
    });
  });
});
