/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
  type LogContext,
  type LoggerConfig,
  type StructuredLogger,
  type DomainLogMethods,
  type ValidationCounts,
} from './logger.js';
