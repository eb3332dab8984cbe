/**
 * Validation Module
 * @module validation
 */

export { validate } from './cross-reference-validator.js';
export { BUILTIN_RULES, SCHEDULERS, BASE_OS } from './rules.js';
export type {
  ValidationSeverity,
  ValidationIssueKind,
  ValidationError,
  ValidationWarning,
  CrossReference,
  ValidationReport,
  ValidationRule,
  ValidationOptions,
} from './types.js';
