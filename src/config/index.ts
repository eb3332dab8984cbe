/**
 * Configuration Module
 * @module config
 *
 * Central access point for the engine configuration. `initConfig()` loads and
 * validates it once at startup; library callers that never initialize get
 * the schema defaults.
 */

import {
  ConfigLoader,
  ConfigLoaderOptions,
  getDefaultConfig,
} from './loader.js';
import type { AppConfig } from './schema.js';

let configInstance: AppConfig | null = null;

// ============================================================================
// Initialization
// ============================================================================

/**
 * Load and validate configuration from all sources.
 * Throws ConfigurationError when a source is unreadable or the result is
 * invalid.
 */
export async function initConfig(options: ConfigLoaderOptions = {}): Promise<AppConfig> {
  if (configInstance) {
    return configInstance;
  }

  configInstance = await new ConfigLoader(options).load();
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// ============================================================================
// Configuration Access
// ============================================================================

/**
 * Get the current configuration, or the defaults when uninitialized
 */
export function getConfig(): AppConfig {
  return configInstance ?? getDefaultConfig();
}

export function isConfigInitialized(): boolean {
  return configInstance !== null;
}

export function getValidationConfig(): AppConfig['validation'] {
  return getConfig().validation;
}

export function getTemplateConfig(): AppConfig['template'] {
  return getConfig().template;
}

export {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  formatZodIssues,
  getDefaultConfig,
  type ConfigSource,
  type ConfigLoaderOptions,
} from './loader.js';

export {
  AppConfigSchema,
  LoggingConfigSchema,
  ServerConfigSchema,
  ValidationConfigSchema,
  TemplateConfigSchema,
  Environment,
  LogLevel,
  type AppConfig,
  type LoggingConfig,
  type ServerConfig,
  type ValidationConfig,
  type TemplateConfig,
  type RawConfig,
} from './schema.js';
