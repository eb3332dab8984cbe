/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for the engine configuration. These are the resolver's own
 * settings (logging, server, validation bounds, template defaults), not the
 * cluster configurations it renders.
 */

import { z } from 'zod';
import { BUILTIN_RULES } from '../validation/rules.js';

const RULE_IDS: ReadonlySet<string> = new Set(BUILTIN_RULES.map(rule => rule.id));

// ============================================================================
// Environment Enum
// ============================================================================

export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

export const LoggingConfigSchema = z.object({
  /** Minimum level emitted */
  level: LogLevel.default('info'),
  /** Human-readable output through pino-pretty */
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Server Configuration
// ============================================================================

export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** Port to listen on */
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  /** Maximum request body size in bytes */
  bodyLimit: z.coerce.number().int().min(1024).default(1024 * 1024),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Validation Configuration
// ============================================================================

/**
 * Settings for the cross-reference validator
 */
export const ValidationConfigSchema = z.object({
  /** Smallest accepted root volume, in GiB */
  rootVolumeMinGiB: z.coerce.number().int().min(1).default(20),
  /** Largest accepted root volume, in GiB */
  rootVolumeMaxGiB: z.coerce.number().int().min(1).default(16384),
  /** Schedulers accepted in addition to the built-in set */
  extraSchedulers: z.array(z.string().min(1)).default([]),
  /** Base operating systems accepted in addition to the built-in set */
  extraBaseOs: z.array(z.string().min(1)).default([]),
  /** Rule ids whose issues are dropped from reports */
  disabledRules: z.array(
    z.string().refine(id => RULE_IDS.has(id), id => ({ message: `Unknown validation rule '${id}'` }))
  ).default([]),
}).refine(
  (v) => v.rootVolumeMinGiB <= v.rootVolumeMaxGiB,
  { message: 'rootVolumeMinGiB must not exceed rootVolumeMaxGiB', path: ['rootVolumeMinGiB'] }
);

export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;

// ============================================================================
// Template Configuration
// ============================================================================

export const TemplateConfigSchema = z.object({
  /** Template used when none is given; the packaged template when unset */
  path: z.string().min(1).optional(),
  /** Environment variable prefix for template variables */
  variablePrefix: z.string().min(1).default('CLUSTER_VAR_'),
  /** Number of templates rendered at once in batch runs */
  renderConcurrency: z.coerce.number().int().min(1).max(64).default(4),
});

export type TemplateConfig = z.infer<typeof TemplateConfigSchema>;

// ============================================================================
// Complete Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  logging: LoggingConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  validation: ValidationConfigSchema.default({}),
  template: TemplateConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Unvalidated configuration fragment as produced by a config source
 */
export type RawConfig = Record<string, unknown>;
