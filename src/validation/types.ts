/**
 * Validation Types
 * @module validation/types
 */

import type { SectionCatalog } from '../catalog/section-catalog.js';

export type ValidationSeverity = 'error' | 'warning';

export type ValidationIssueKind =
  | 'reference'
  | 'enum'
  | 'range'
  | 'format'
  | 'required'
  | 'partition';

/**
 * A check that makes the configuration unsafe to provision
 */
export interface ValidationError {
  readonly kind: ValidationIssueKind;
  /** Rule identifier, e.g. CC002 */
  readonly rule: string;
  /** Section name, e.g. `cluster default` */
  readonly section: string;
  readonly field: string;
  readonly message: string;
  readonly value?: string;
  readonly expected?: string;
}

export interface ValidationWarning {
  readonly rule: string;
  readonly section: string;
  readonly field?: string;
  readonly message: string;
}

/**
 * A `*_settings` value that resolved to an existing section
 */
export interface CrossReference {
  readonly section: string;
  readonly field: string;
  readonly targetKind: string;
  readonly targetLabel: string;
  /** Index of the target in ResolvedConfig.sections */
  readonly targetIndex: number;
}

export interface ValidationReport {
  /** True when there are no errors; warnings do not count */
  readonly valid: boolean;
  readonly errors: readonly ValidationError[];
  readonly warnings: readonly ValidationWarning[];
  readonly references: readonly CrossReference[];
}

export interface ValidationRule {
  readonly id: string;
  readonly description: string;
  readonly severity: ValidationSeverity;
}

export interface ValidationOptions {
  readonly rootVolumeMinGiB?: number;
  readonly rootVolumeMaxGiB?: number;
  readonly extraSchedulers?: readonly string[];
  readonly extraBaseOs?: readonly string[];
  /** Rule ids whose issues are dropped */
  readonly disabledRules?: readonly string[];
  readonly catalog?: SectionCatalog;
}
