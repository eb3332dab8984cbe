/**
 * Config Writer / Reader
 * @module resolution/config-writer
 */

import { AssembleError } from '../errors/domain.js';
import { Result, andThen } from '../utils/result.js';
import { parseTemplate, INLINE_SOURCE } from '../parsers/cluster-template/template-parser.js';
import { selectBranches } from './conditional-resolver.js';
import { assemble } from './section-assembler.js';
import type { ResolvedConfig, VariableMap } from './types.js';

/**
 * Emit a resolved configuration: `[name]` headers, `key = value` lines, a
 * blank line between sections and a trailing newline
 */
export function formatConfig(config: ResolvedConfig): string {
  const blocks = config.sections.map(section => {
    const lines = [`[${section.name}]`];
    for (const [key, value] of section.entries) {
      lines.push(value === '' ? `${key} =` : `${key} = ${value}`);
    }
    return lines.join('\n');
  });
  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
}

/**
 * Read resolved text back. Any marker left in the text is unbound.
 */
export function parseResolvedConfig(
  text: string,
  source: string = INLINE_SOURCE
): Result<ResolvedConfig, AssembleError> {
  const empty: VariableMap = {};
  return andThen(
    andThen(parseTemplate(text, source), document => selectBranches(document, empty)),
    sections => assemble(empty, sections, { source })
  );
}

/**
 * Plain-object view of a configuration: section name -> key -> value
 */
export function toSectionMap(config: ResolvedConfig): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  for (const section of config.sections) {
    result[section.name] = Object.fromEntries(section.entries);
  }
  return result;
}
