/**
 * Configuration System Tests
 * @module tests/config
 *
 * Tests for configuration loading, source priority and validation.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigLoader,
  EnvironmentConfigSource,
  type ConfigSource,
} from '../src/config/loader.js';
import {
  getConfig,
  getTemplateConfig,
  initConfig,
  isConfigInitialized,
  resetConfig,
} from '../src/config/index.js';
import { ConfigurationError } from '../src/errors/domain.js';

describe('Configuration Tests', () => {
  describe('ConfigLoader', () => {
    it('should fill every field from the schema defaults', async () => {
      const config = await new ConfigLoader({ env: {} }).load();

      expect(config).toEqual({
        env: 'development',
        logging: { level: 'info', pretty: false },
        server: { host: '0.0.0.0', port: 3000, bodyLimit: 1048576 },
        validation: {
          rootVolumeMinGiB: 20,
          rootVolumeMaxGiB: 16384,
          extraSchedulers: [],
          extraBaseOs: [],
          disabledRules: [],
        },
        template: { variablePrefix: 'CLUSTER_VAR_', renderConcurrency: 4 },
      });
    });

    it('should read and coerce environment variables', async () => {
      const config = await new ConfigLoader({
        env: {
          NODE_ENV: 'production',
          LOG_LEVEL: 'warn',
          LOG_PRETTY: 'TRUE',
          PORT: '8080',
          VALIDATION_DISABLED_RULES: 'CC021, CC022,',
          CLUSTER_TEMPLATE_PATH: '/etc/cluster/template.ini',
          RENDER_CONCURRENCY: '8',
        },
      }).load();

      expect(config.env).toBe('production');
      expect(config.logging).toEqual({ level: 'warn', pretty: true });
      expect(config.server.port).toBe(8080);
      expect(config.validation.disabledRules).toEqual(['CC021', 'CC022']);
      expect(config.template).toEqual({
        path: '/etc/cluster/template.ini',
        variablePrefix: 'CLUSTER_VAR_',
        renderConcurrency: 8,
      });
    });

    it('should reject an invalid port', async () => {
      await expect(new ConfigLoader({ env: { PORT: '70000' } }).load()).rejects.toThrow(
        /^Configuration validation failed:\n {2}- server\.port: /
      );
    });

    it('should reject unknown rule ids', async () => {
      await expect(new ConfigLoader({ env: { VALIDATION_DISABLED_RULES: 'CC999' } }).load()).rejects.toThrow(
        "validation.disabledRules.0: Unknown validation rule 'CC999'"
      );
    });

    it('should reject inverted root volume bounds', async () => {
      const loader = new ConfigLoader({
        env: { VALIDATION_ROOT_VOLUME_MIN_GIB: '100', VALIDATION_ROOT_VOLUME_MAX_GIB: '50' },
      });

      await expect(loader.load()).rejects.toThrow(
        'Configuration validation failed:\n  - validation.rootVolumeMinGiB: rootVolumeMinGiB must not exceed rootVolumeMaxGiB'
      );
    });

    it('should merge custom sources by priority', async () => {
      const source = (name: string, priority: number, port: number): ConfigSource => ({
        name,
        priority,
        isAvailable: () => true,
        load: async () => ({ server: { port } }),
      });
      const loader = new ConfigLoader({ sources: [source('high', 20, 7001), source('low', 1, 7000)] });

      expect((await loader.load()).server.port).toBe(7001);
    });

    it('should skip unavailable sources', async () => {
      const loader = new ConfigLoader({ sources: [new EnvironmentConfigSource({ PORT: '7100' })] });
      loader.addSource({
        name: 'offline',
        priority: 99,
        isAvailable: () => false,
        load: async () => ({ server: { port: 1 } }),
      });

      expect((await loader.load()).server.port).toBe(7100);
    });

    it('should throw from get() before load()', () => {
      expect(() => new ConfigLoader({ env: {} }).get()).toThrow(ConfigurationError);
    });
  });

  describe('configuration files', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'cluster-config-'));
      await writeFile(
        join(dir, 'engine.yaml'),
        'server:\n  port: 4000\n  host: 127.0.0.1\nvalidation:\n  extraSchedulers: [pbs]\n'
      );
      await writeFile(join(dir, 'list.yaml'), '- a\n- b\n');
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should layer the environment over the file', async () => {
      const config = await new ConfigLoader({
        env: { CLUSTER_CONFIG_FILE: join(dir, 'engine.yaml'), PORT: '5000' },
      }).load();

      expect(config.server).toEqual({ host: '127.0.0.1', port: 5000, bodyLimit: 1048576 });
      expect(config.validation.extraSchedulers).toEqual(['pbs']);
    });

    it('should fail when the named file does not exist', async () => {
      const path = join(dir, 'missing.yaml');

      await expect(new ConfigLoader({ env: { CLUSTER_CONFIG_FILE: path } }).load()).rejects.toMatchObject({
        message: `Configuration file not found: file:${path}`,
        code: 'CONFIG_FILE_ERROR',
      });
    });

    it('should require a mapping', async () => {
      const loader = new ConfigLoader({ env: { CLUSTER_CONFIG_FILE: join(dir, 'list.yaml') } });

      await expect(loader.load()).rejects.toMatchObject({
        message: 'Configuration file must contain a mapping',
        code: 'CONFIG_FILE_ERROR',
      });
    });
  });

  describe('initConfig', () => {
    it('should load once and cache the result', async () => {
      const first = await initConfig({ env: { PORT: '4001' } });
      const second = await initConfig({ env: { PORT: '4002' } });

      expect(second).toBe(first);
      expect(getConfig().server.port).toBe(4001);
      expect(isConfigInitialized()).toBe(true);
    });

    it('should fall back to defaults after reset', async () => {
      await initConfig({ env: { CLUSTER_VAR_PREFIX: 'PC_' } });
      expect(getTemplateConfig().variablePrefix).toBe('PC_');

      resetConfig();

      expect(isConfigInitialized()).toBe(false);
      expect(getTemplateConfig().variablePrefix).toBe('CLUSTER_VAR_');
    });
  });
});
