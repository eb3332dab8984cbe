/**
 * Resolution Module
 * @module resolution
 *
 * Binder, conditional resolver, section assembler and config writer.
 */

export * from './types.js';
export {
  PARTITIONS,
  DEFAULT_PARTITION,
  classifyRegion,
  isPartition,
  partitionDnsSuffix,
  partitionForHost,
  s3ReadResource,
  type Partition,
} from './region.js';
export { bind } from './variable-binder.js';
export {
  DEFAULT_VARIABLE_PREFIX,
  collectVariables,
  parseProfile,
  loadProfile,
  fromEnvironment,
  parseVariableFlags,
  type VariableSourceSet,
} from './variable-sources.js';
export {
  resolve,
  placeholderValues,
  evaluatePredicate,
  lookupVariable,
  selectBranches,
} from './conditional-resolver.js';
export {
  DEFAULT_CLUSTER_TEMPLATE,
  assemble,
  createResolvedConfig,
  findSection,
  findSectionRef,
  getSection,
  sectionName,
  type AssembleOptions,
} from './section-assembler.js';
export { formatConfig, parseResolvedConfig, toSectionMap } from './config-writer.js';
export {
  BUILTIN_TEMPLATE_PATH,
  BUILTIN_TEMPLATE_VARIABLES,
  loadBuiltinTemplate,
} from './builtin-template.js';
