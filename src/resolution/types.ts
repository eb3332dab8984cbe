/**
 * Resolution Types
 * @module resolution/types
 *
 * Shapes passed between the binder, the conditional resolver, the section
 * assembler and the validator.
 */

import type { Partition } from './region.js';
import type { EntryNode, ValueSegment } from '../parsers/cluster-template/types.js';

// ============================================================================
// Variables
// ============================================================================

/**
 * One entry of a template's variable schema
 */
export interface VariableSpec {
  readonly name: string;
  readonly required: boolean;
  readonly default?: string;
  readonly description?: string;
}

/**
 * Flat name -> value mapping of bound variables
 */
export type VariableMap = Readonly<Record<string, string>>;

// ============================================================================
// Placeholders
// ============================================================================

export interface FeatureFlags {
  readonly customNode?: string;
  readonly customCookbook?: string;
}

/**
 * Values the conditional resolver contributes to the substitution context
 */
export interface ResolvedPlaceholders {
  readonly partition: Partition;
  /** Compact JSON for the cluster's `extra_json` key */
  readonly extraJson: string;
  /** Set only when a custom cookbook was given */
  readonly customChefCookbook?: string;
}

// ============================================================================
// Sections
// ============================================================================

/**
 * Section after branch selection, before substitution
 */
export interface SectionTemplate {
  readonly kind: string;
  readonly label: readonly ValueSegment[] | null;
  readonly line: number;
  readonly raw: string;
  readonly entries: readonly EntryNode[];
}

/**
 * Fully substituted section
 */
export interface Section {
  readonly kind: string;
  readonly label: string | null;
  /** `kind` or `kind label`, unique within a configuration */
  readonly name: string;
  /** Insertion order is declaration order */
  readonly entries: ReadonlyMap<string, string>;
}

/**
 * Validated index into ResolvedConfig.sections
 */
export interface SectionRef {
  readonly kind: string;
  readonly label: string | null;
  readonly index: number;
}

/**
 * Ordered sections plus a name lookup and the active cluster
 */
export interface ResolvedConfig {
  readonly sections: readonly Section[];
  readonly index: ReadonlyMap<string, number>;
  /** Value of global.cluster_template, `default` when unset */
  readonly clusterTemplate: string;
  /** The `cluster <clusterTemplate>` section, null when it does not exist */
  readonly activeCluster: SectionRef | null;
}
