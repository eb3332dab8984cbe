/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the cluster configuration
 * resolver. Includes domain-specific logging methods for template rendering,
 * config validation and batch runs.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';
import { isBaseError } from '../errors/base.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  requestId?: string;
  source?: string;
  operation?: string;
  module?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Counts reported once a configuration has been validated
 */
export interface ValidationCounts {
  valid: boolean;
  errorCount: number;
  warningCount: number;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  // Render lifecycle
  renderStarted(source: string, metadata?: Record<string, unknown>): void;
  renderCompleted(source: string, durationMs: number, sectionCount: number, counts: ValidationCounts): void;
  renderFailed(source: string, error: Error): void;

  // Validation
  configValidated(source: string, counts: ValidationCounts): void;

  // Batch runs
  batchCompleted(total: number, failed: number, durationMs: number): void;
}

/**
 * Pino logger extended with domain-specific methods
 */
export type StructuredLogger = Omit<Logger, 'child'> & DomainLogMethods & {
  child(bindings: LogContext): StructuredLogger;
  withContext(context: LogContext): StructuredLogger;
};

// ============================================================================
// Default Configuration
// ============================================================================

const ROOT_LOGGER_NAME = 'cluster-config';

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true',
    redact: [
      'password',
      'token',
      'authorization',
      'secret',
      'secretKey',
      'secret_key',
      'accessKey',
      'access_key',
      'aws_access_key_id',
      'aws_secret_access_key',
      'headers.authorization',
      'headers.cookie',
    ],
    service: process.env.SERVICE_NAME || ROOT_LOGGER_NAME,
    version: process.env.SERVICE_VERSION || '0.1.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

// ============================================================================
// Redaction Utilities
// ============================================================================

function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

function errorCodeOf(error: Error): string | undefined {
  return isBaseError(error) ? error.code : undefined;
}

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const originalChild = logger.child.bind(logger);

  const methods: DomainLogMethods = {
    renderStarted(source, metadata) {
      logger.debug({ event: 'render_started', source, ...metadata }, `Rendering ${source}`);
    },

    renderCompleted(source, durationMs, sectionCount, counts) {
      logger.info(
        {
          event: 'render_completed',
          source,
          durationMs,
          sectionCount,
          valid: counts.valid,
          errorCount: counts.errorCount,
          warningCount: counts.warningCount,
        },
        `Rendered ${source}: ${sectionCount} sections in ${durationMs}ms`
      );
    },

    renderFailed(source, error) {
      logger.warn(
        { event: 'render_failed', source, err: error, errorCode: errorCodeOf(error) },
        `Render failed for ${source}: ${error.message}`
      );
    },

    configValidated(source, counts) {
      if (counts.valid) {
        logger.debug({ event: 'config_validated', source, ...counts }, 'Configuration validation passed');
      } else {
        logger.warn(
          { event: 'config_validated', source, ...counts },
          `Configuration validation failed with ${counts.errorCount} errors`
        );
      }
    },

    batchCompleted(total, failed, durationMs) {
      logger.info(
        { event: 'batch_completed', total, failed, durationMs },
        `Batch completed: ${total - failed}/${total} succeeded in ${durationMs}ms`
      );
    },
  };

  // Children keep the domain methods
  const child = (bindings: LogContext): StructuredLogger =>
    extendWithDomainMethods(originalChild(bindings));

  return Object.assign(logger, methods, { child, withContext: child });
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        // Logs go to stderr so rendered configs on stdout stay clean
        destination: 2,
      },
    });
  } else {
    destination = pino.destination(2);
  }

  const baseLogger = pino(options, destination);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger(ROOT_LOGGER_NAME);
  }
  return rootLogger;
}

/**
 * Initializes the root logger, typically from the loaded engine config
 */
export function initLogger(
  overrides: Partial<LoggerConfig> = {},
  context?: LogContext
): StructuredLogger {
  rootLogger = createLogger(ROOT_LOGGER_NAME, context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component.
 * The root logger is resolved on every call so that a later initLogger()
 * takes effect for loggers created lazily.
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}
