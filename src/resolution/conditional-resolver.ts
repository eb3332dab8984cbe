/**
 * Conditional Resolver
 * @module resolution/conditional-resolver
 *
 * Computes the region- and feature-dependent placeholders and selects one
 * branch of every `{% if %}` block in a parsed template.
 */

import { AssembleError } from '../errors/domain.js';
import { Result, ok, err } from '../utils/result.js';
import { classifyRegion } from './region.js';
import type {
  EntryNode,
  Predicate,
  SectionHeaderNode,
  TemplateDocument,
  TemplateNode,
} from '../parsers/cluster-template/types.js';
import type {
  FeatureFlags,
  ResolvedPlaceholders,
  SectionTemplate,
  VariableMap,
} from './types.js';

// ============================================================================
// Placeholders
// ============================================================================

function isSet(value: string | undefined): value is string {
  return value !== undefined && value !== '';
}

/**
 * Resolve the placeholders that depend on region and optional features.
 * The two feature flags are independent of each other and of the region.
 */
export function resolve(region: string, flags: FeatureFlags = {}): ResolvedPlaceholders {
  const cluster: Record<string, string> = { skip_install_recipes: 'no' };
  if (isSet(flags.customNode)) {
    cluster.custom_node_package = flags.customNode;
  }

  const placeholders: ResolvedPlaceholders = {
    partition: classifyRegion(region),
    extraJson: JSON.stringify({ cluster }),
  };

  return isSet(flags.customCookbook)
    ? { ...placeholders, customChefCookbook: flags.customCookbook }
    : placeholders;
}

/**
 * Placeholders as substitution variables
 */
export function placeholderValues(placeholders: ResolvedPlaceholders): VariableMap {
  const values: Record<string, string> = {
    partition: placeholders.partition,
    extra_json: placeholders.extraJson,
  };
  if (placeholders.customChefCookbook !== undefined) {
    values.custom_chef_cookbook = placeholders.customChefCookbook;
  }
  return values;
}

// ============================================================================
// Predicate Evaluation
// ============================================================================

export function lookupVariable(context: VariableMap, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(context, name) ? context[name] : undefined;
}

/**
 * Evaluate a predicate. Unbound variables compare as the empty string.
 */
export function evaluatePredicate(predicate: Predicate, context: VariableMap): boolean {
  switch (predicate.type) {
    case 'present':
      return isSet(lookupVariable(context, predicate.variable));
    case 'startsWith':
      return (lookupVariable(context, predicate.variable) ?? '').startsWith(predicate.prefix);
    case 'equals':
      return (lookupVariable(context, predicate.variable) ?? '') === predicate.literal;
    case 'notEquals':
      return (lookupVariable(context, predicate.variable) ?? '') !== predicate.literal;
    case 'not':
      return !evaluatePredicate(predicate.operand, context);
  }
}

// ============================================================================
// Branch Selection
// ============================================================================

type SelectedNode = SectionHeaderNode | EntryNode;

function flatten(nodes: readonly TemplateNode[], context: VariableMap, out: SelectedNode[]): void {
  for (const node of nodes) {
    switch (node.type) {
      case 'comment':
        break;
      case 'section':
      case 'entry':
        out.push(node);
        break;
      case 'conditional': {
        const chosen = node.branches.find(branch => evaluatePredicate(branch.predicate, context));
        const body = chosen ? chosen.body : node.elseBody;
        if (body) {
          flatten(body, context, out);
        }
        break;
      }
    }
  }
}

/**
 * Keep the selected branch of every conditional and group the surviving
 * entries under their section headers
 */
export function selectBranches(
  document: TemplateDocument,
  context: VariableMap
): Result<SectionTemplate[], AssembleError> {
  const selected: SelectedNode[] = [];
  flatten(document.nodes, context, selected);

  const sections: SectionTemplate[] = [];
  let entries: EntryNode[] | null = null;

  for (const node of selected) {
    if (node.type === 'section') {
      entries = [];
      sections.push({ kind: node.kind, label: node.label, line: node.line, raw: node.raw, entries });
      continue;
    }
    if (!entries) {
      // Its header sits in a branch that was not selected
      return err(new AssembleError('EntryOutsideSection', `Entry '${node.key}' has no section after branch selection`, {
        line: node.line,
        fragment: node.raw.trim(),
        source: document.source,
      }));
    }
    entries.push(node);
  }

  return ok(sections);
}
