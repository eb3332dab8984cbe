/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation. Sources are merged in
 * priority order (defaults < config file < environment) and the result is
 * validated against the zod schema.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { AppConfig, AppConfigSchema, RawConfig } from './schema.js';
import { ConfigurationError } from '../errors/domain.js';
import { ConfigErrorCodes } from '../errors/codes.js';
import { getErrorMessage } from '../errors/base.js';
import { createModuleLogger } from '../logging/logger.js';
import { deepMerge, filterUndefined, isRecord } from '../utils/objects.js';

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  /** Unique name for the source */
  name: string;
  /** Priority level (higher = overrides lower) */
  priority: number;
  /** Load configuration from this source */
  load(): Promise<RawConfig>;
  /** Whether this source is available */
  isAvailable(): boolean;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value.toLowerCase() === 'true';
}

/**
 * Environment variable configuration source.
 * Numeric values are passed through as strings and coerced by the schema.
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    const env = this.env;

    return filterUndefined({
      env: env.NODE_ENV,
      logging: {
        level: env.LOG_LEVEL,
        pretty: parseBoolean(env.LOG_PRETTY),
      },
      server: {
        host: env.HOST,
        port: env.PORT,
        bodyLimit: env.BODY_LIMIT,
      },
      validation: {
        rootVolumeMinGiB: env.VALIDATION_ROOT_VOLUME_MIN_GIB,
        rootVolumeMaxGiB: env.VALIDATION_ROOT_VOLUME_MAX_GIB,
        extraSchedulers: parseList(env.VALIDATION_EXTRA_SCHEDULERS),
        extraBaseOs: parseList(env.VALIDATION_EXTRA_BASE_OS),
        disabledRules: parseList(env.VALIDATION_DISABLED_RULES),
      },
      template: {
        path: env.CLUSTER_TEMPLATE_PATH,
        variablePrefix: env.CLUSTER_VAR_PREFIX,
        renderConcurrency: env.RENDER_CONCURRENCY,
      },
    });
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * YAML or JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<RawConfig> {
    let parsed: unknown;
    try {
      const content = await readFile(this.filePath, 'utf-8');
      // YAML is a superset of JSON, so one parser covers both
      parsed = parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(
        `file:${this.filePath}`,
        `Failed to load configuration file: ${getErrorMessage(error)}`,
        { cause: error instanceof Error ? error : undefined },
        ConfigErrorCodes.CONFIG_FILE_ERROR
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(
        `file:${this.filePath}`,
        'Configuration file must contain a mapping',
        {},
        ConfigErrorCodes.CONFIG_FILE_ERROR
      );
    }
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Custom config sources (replace the defaults) */
  sources?: ConfigSource[];
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map(e => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
    .join('\n');
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private sources: ConfigSource[] = [];
  private config: AppConfig | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    const env = options.env ?? process.env;

    if (options.sources && options.sources.length > 0) {
      this.sources = [...options.sources];
    } else {
      if (env.CLUSTER_CONFIG_FILE) {
        this.sources.push(new FileConfigSource(env.CLUSTER_CONFIG_FILE, 5));
      }
      this.sources.push(new EnvironmentConfigSource(env));
    }

    this.sources.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Add a configuration source
   */
  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    this.config = null;
    return this;
  }

  /**
   * Load and validate configuration from all sources
   */
  async load(): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    const logger = createModuleLogger('config-loader');
    const merged: RawConfig = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        if (source instanceof FileConfigSource) {
          throw new ConfigurationError(
            source.name,
            `Configuration file not found: ${source.name}`,
            {},
            ConfigErrorCodes.CONFIG_FILE_ERROR
          );
        }
        logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }

      const partial = await source.load();
      deepMerge(merged, partial);
      logger.debug({ source: source.name }, 'Loaded config from source');
    }

    const result = AppConfigSchema.safeParse(merged);

    if (!result.success) {
      throw new ConfigurationError(
        'config',
        `Configuration validation failed:\n${formatZodIssues(result.error)}`,
        { details: { issues: result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message })) } }
      );
    }

    this.config = result.data;
    logger.debug({ env: this.config.env }, 'Configuration loaded');

    return this.config;
  }

  /**
   * Get loaded configuration (throws if not loaded)
   */
  get(): AppConfig {
    if (!this.config) {
      throw new ConfigurationError('config', 'Configuration not loaded. Call load() first.');
    }
    return this.config;
  }
}

/**
 * The configuration every field defaults to
 */
export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
