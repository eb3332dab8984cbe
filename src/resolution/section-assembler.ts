/**
 * Section Assembler
 * @module resolution/section-assembler
 *
 * Substitutes variable values into selected section templates and builds the
 * ResolvedConfig arena. Stops at the first duplicate, unbound marker or
 * header that breaks the catalog's label rule.
 */

import { AssembleError } from '../errors/domain.js';
import { Result, ok, err } from '../utils/result.js';
import { getSectionCatalog, SectionCatalog } from '../catalog/section-catalog.js';
import { lookupVariable } from './conditional-resolver.js';
import type { ValueSegment } from '../parsers/cluster-template/types.js';
import type {
  ResolvedConfig,
  Section,
  SectionRef,
  SectionTemplate,
  VariableMap,
} from './types.js';

export const DEFAULT_CLUSTER_TEMPLATE = 'default';

export interface AssembleOptions {
  /** Template source name used in error locations */
  source?: string;
  catalog?: SectionCatalog;
}

// ============================================================================
// Substitution
// ============================================================================

function substitute(
  segments: readonly ValueSegment[],
  values: VariableMap,
  line: number,
  source: string
): Result<string, AssembleError> {
  let text = '';
  for (const segment of segments) {
    if (segment.type === 'literal') {
      text += segment.text;
      continue;
    }
    const value = lookupVariable(values, segment.name);
    if (value === undefined) {
      return err(new AssembleError('UnboundPlaceholder', `No value for variable '${segment.name}'`, {
        line,
        fragment: segment.raw,
        source,
      }));
    }
    text += value;
  }
  return ok(text);
}

/**
 * Section name as written in a header
 */
export function sectionName(kind: string, label: string | null): string {
  return label === null ? kind : `${kind} ${label}`;
}

// ============================================================================
// Assembly
// ============================================================================

/**
 * Assemble section templates into a ResolvedConfig
 */
export function assemble(
  values: VariableMap,
  sectionTemplates: readonly SectionTemplate[],
  options: AssembleOptions = {}
): Result<ResolvedConfig, AssembleError> {
  const source = options.source ?? '<inline>';
  const catalog = options.catalog ?? getSectionCatalog();
  const sections: Section[] = [];

  for (const template of sectionTemplates) {
    const location = { line: template.line, fragment: template.raw.trim(), source };

    let label: string | null = null;
    if (template.label !== null) {
      const resolved = substitute(template.label, values, template.line, source);
      if (!resolved.ok) {
        return resolved;
      }
      label = resolved.value.trim() === '' ? null : resolved.value.trim();
    }

    if (label !== null && /\s/.test(label)) {
      return err(new AssembleError('InvalidSectionHeader', `Section label '${label}' contains whitespace`, location));
    }

    const rule = catalog.labelRule(template.kind);
    if (rule === 'required' && label === null) {
      return err(new AssembleError('InvalidSectionHeader', `Section '${template.kind}' needs a label`, location));
    }
    if (rule === 'forbidden' && label !== null) {
      return err(new AssembleError('InvalidSectionHeader', `Section '${template.kind}' takes no label`, location));
    }

    const name = sectionName(template.kind, label);
    if (sections.some(s => s.name === name)) {
      return err(new AssembleError('DuplicateSection', `Section '${name}' is declared twice`, location));
    }

    const entries = new Map<string, string>();
    for (const entry of template.entries) {
      if (entries.has(entry.key)) {
        return err(new AssembleError('DuplicateKey', `Key '${entry.key}' appears twice in section '${name}'`, {
          line: entry.line,
          fragment: entry.raw.trim(),
          source,
        }));
      }
      const value = substitute(entry.value, values, entry.line, source);
      if (!value.ok) {
        return value;
      }
      entries.set(entry.key, value.value);
    }

    sections.push({ kind: template.kind, label, name, entries });
  }

  return ok(createResolvedConfig(sections));
}

/**
 * Build the index and active-cluster pointer for a list of sections.
 * Section names must already be unique.
 */
export function createResolvedConfig(sections: readonly Section[]): ResolvedConfig {
  const index = new Map<string, number>();
  sections.forEach((section, i) => index.set(section.name, i));

  const clusterTemplate = findSection({ sections, index }, 'global')?.entries.get('cluster_template')
    ?? DEFAULT_CLUSTER_TEMPLATE;

  return {
    sections,
    index,
    clusterTemplate,
    activeCluster: findSectionRef({ sections, index }, 'cluster', clusterTemplate),
  };
}

// ============================================================================
// Lookup
// ============================================================================

type SectionArena = Pick<ResolvedConfig, 'sections' | 'index'>;

/**
 * Reference to the section `kind label`, or null
 */
export function findSectionRef(
  config: SectionArena,
  kind: string,
  label: string | null = null
): SectionRef | null {
  const index = config.index.get(sectionName(kind, label));
  return index === undefined ? null : { kind, label, index };
}

export function findSection(
  config: SectionArena,
  kind: string,
  label: string | null = null
): Section | undefined {
  const ref = findSectionRef(config, kind, label);
  return ref ? config.sections[ref.index] : undefined;
}

/**
 * Dereference a SectionRef
 */
export function getSection(config: SectionArena, ref: SectionRef): Section {
  return config.sections[ref.index];
}
