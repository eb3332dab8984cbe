/**
 * Cluster Template Types
 * @module parsers/cluster-template/types
 *
 * Document model for cluster configuration templates: `[kind label]`
 * headers, `key = value` entries with `{{ name }}` markers, comments and
 * `{% if %}` blocks.
 */

// ============================================================================
// Values
// ============================================================================

/**
 * A piece of an entry value or section label
 */
export type ValueSegment =
  | { readonly type: 'literal'; readonly text: string }
  | { readonly type: 'placeholder'; readonly name: string; readonly raw: string };

// ============================================================================
// Predicates
// ============================================================================

/**
 * Closed set of conditions a `{% if %}` / `{% elif %}` may test
 */
export type Predicate =
  | { readonly type: 'present'; readonly variable: string }
  | { readonly type: 'startsWith'; readonly variable: string; readonly prefix: string }
  | { readonly type: 'equals'; readonly variable: string; readonly literal: string }
  | { readonly type: 'notEquals'; readonly variable: string; readonly literal: string }
  | { readonly type: 'not'; readonly operand: Predicate };

// ============================================================================
// Nodes
// ============================================================================

export interface SectionHeaderNode {
  readonly type: 'section';
  readonly kind: string;
  /** Label segments, null for `[global]`-style headers */
  readonly label: readonly ValueSegment[] | null;
  readonly line: number;
  readonly raw: string;
}

export interface EntryNode {
  readonly type: 'entry';
  readonly key: string;
  readonly value: readonly ValueSegment[];
  readonly line: number;
  readonly raw: string;
}

export interface CommentNode {
  readonly type: 'comment';
  readonly text: string;
  readonly line: number;
}

export interface ConditionalBranch {
  readonly predicate: Predicate;
  readonly body: readonly TemplateNode[];
  /** Line of the `if` / `elif` directive */
  readonly line: number;
}

export interface ConditionalNode {
  readonly type: 'conditional';
  /** The `if` branch followed by any `elif` branches */
  readonly branches: readonly ConditionalBranch[];
  /** Body of `else`, null when the block has none */
  readonly elseBody: readonly TemplateNode[] | null;
  readonly line: number;
  readonly endLine: number;
}

export type TemplateNode = SectionHeaderNode | EntryNode | CommentNode | ConditionalNode;

/**
 * Parsed template
 */
export interface TemplateDocument {
  readonly source: string;
  readonly nodes: readonly TemplateNode[];
  /** Every variable a marker or predicate refers to, sorted */
  readonly variables: readonly string[];
}
