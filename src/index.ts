/**
 * Cluster Configuration Resolver
 * @module cluster-config-resolver
 *
 * Main entry point. Renders cluster configuration templates into concrete
 * INI configurations and validates them before provisioning.
 *
 * @example
 * ```typescript
 * import { ClusterConfigService } from 'cluster-config-resolver';
 *
 * const service = new ClusterConfigService();
 * const outcome = service.render({ variables: { region: 'eu-west-1', ... } });
 * if (outcome.status === 'resolved' && outcome.report.valid) {
 *   console.log(outcome.text);
 * }
 * ```
 */

// ============================================================================
// Pipeline
// ============================================================================

export * from './parsers/cluster-template/index.js';
export * from './resolution/index.js';
export * from './validation/index.js';
export {
  SectionCatalog,
  getSectionCatalog,
  parseSectionCatalog,
  type SectionKindInfo,
} from './catalog/section-catalog.js';

// ============================================================================
// Service
// ============================================================================

export {
  ClusterConfigService,
  type ClusterConfigServiceOptions,
  type RenderRequest,
  type RenderOutcome,
  type ValidateOutcome,
} from './services/cluster-config-service.js';

// ============================================================================
// Ambient
// ============================================================================

export * from './errors/index.js';
export * from './utils/result.js';
export { parallelWithLimit, type Settled } from './utils/concurrency.js';
export {
  initConfig,
  getConfig,
  resetConfig,
  type AppConfig,
} from './config/index.js';
export {
  createLogger,
  createModuleLogger,
  initLogger,
  type StructuredLogger,
} from './logging/index.js';

// ============================================================================
// HTTP
// ============================================================================

export { buildApp, type AppOptions } from './app.js';
