/**
 * Cluster Template Parser
 * @module parsers/cluster-template/template-parser
 *
 * Builds a TemplateDocument from lexer tokens. Conditional blocks are
 * tracked with an explicit stack of open frames; the first error in line
 * order stops the parse.
 */

import { AssembleError, AssembleErrorKind } from '../../errors/domain.js';
import { Result, ok, err } from '../../utils/result.js';
import { TemplateLexer, TemplateToken } from './template-lexer.js';
import type {
  ConditionalBranch,
  ConditionalNode,
  Predicate,
  TemplateDocument,
  TemplateNode,
  ValueSegment,
} from './types.js';

export const INLINE_SOURCE = '<inline>';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SECTION_KIND = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ============================================================================
// Marker Parsing
// ============================================================================

/**
 * Split text into literal and `{{ name }}` segments
 */
export function parseSegments(
  text: string,
  line: number,
  source: string = INLINE_SOURCE
): Result<ValueSegment[], AssembleError> {
  const segments: ValueSegment[] = [];
  let literal = '';
  let pos = 0;

  while (pos < text.length) {
    const open = text.indexOf('{{', pos);
    if (open === -1) {
      literal += text.slice(pos);
      break;
    }

    literal += text.slice(pos, open);
    const close = text.indexOf('}}', open + 2);
    if (close === -1) {
      return err(new AssembleError('MalformedMarker', "Marker '{{' is never closed", {
        line,
        fragment: text.slice(open),
        source,
      }));
    }

    const raw = text.slice(open, close + 2);
    const name = text.slice(open + 2, close).trim();
    if (!VARIABLE_NAME.test(name)) {
      return err(new AssembleError('MalformedMarker', `Invalid variable name in marker ${raw}`, {
        line,
        fragment: raw,
        source,
      }));
    }

    if (literal !== '') {
      segments.push({ type: 'literal', text: literal });
      literal = '';
    }
    segments.push({ type: 'placeholder', name, raw });
    pos = close + 2;
  }

  if (literal !== '') {
    segments.push({ type: 'literal', text: literal });
  }

  return ok(segments);
}

// ============================================================================
// Predicate Parsing
// ============================================================================

const STARTS_WITH = /^([A-Za-z_][A-Za-z0-9_]*)\.startswith\(\s*(['"])(.*)\2\s*\)$/;
const COMPARISON = /^([A-Za-z_][A-Za-z0-9_]*)\s*(==|!=)\s*(['"])(.*)\3$/;

/**
 * Parse the argument of an `if` / `elif` directive.
 * Returns null for anything outside the supported forms.
 */
export function parsePredicate(text: string): Predicate | null {
  const expr = text.trim();

  const negated = /^not\s+(.+)$/.exec(expr);
  if (negated) {
    const operand = parsePredicate(negated[1]);
    return operand ? { type: 'not', operand } : null;
  }

  const startsWith = STARTS_WITH.exec(expr);
  if (startsWith) {
    return { type: 'startsWith', variable: startsWith[1], prefix: startsWith[3] };
  }

  const comparison = COMPARISON.exec(expr);
  if (comparison) {
    const [, variable, operator, , literal] = comparison;
    return operator === '=='
      ? { type: 'equals', variable, literal }
      : { type: 'notEquals', variable, literal };
  }

  if (VARIABLE_NAME.test(expr) && expr !== 'not') {
    return { type: 'present', variable: expr };
  }

  return null;
}

/**
 * Variables a predicate refers to
 */
export function predicateVariables(predicate: Predicate): string[] {
  switch (predicate.type) {
    case 'not':
      return predicateVariables(predicate.operand);
    case 'present':
    case 'startsWith':
    case 'equals':
    case 'notEquals':
      return [predicate.variable];
  }
}

// ============================================================================
// Template Parser
// ============================================================================

interface RootFrame {
  readonly type: 'root';
  readonly body: TemplateNode[];
}

interface ConditionalFrame {
  readonly type: 'conditional';
  readonly line: number;
  readonly raw: string;
  readonly branches: { predicate: Predicate; body: TemplateNode[]; line: number }[];
  elseBody: TemplateNode[] | null;
  /** Body receiving nodes right now */
  body: TemplateNode[];
}

type Frame = RootFrame | ConditionalFrame;

/**
 * Parser for cluster configuration templates
 *
 * @example
 * ```typescript
 * const parsed = new TemplateParser(text, 'cluster.ini').parse();
 * if (parsed.ok) {
 *   console.log(parsed.value.variables);
 * }
 * ```
 */
export class TemplateParser {
  private readonly text: string;
  private readonly source: string;
  private readonly root: RootFrame = { type: 'root', body: [] };
  private readonly stack: ConditionalFrame[] = [];
  private readonly variables = new Set<string>();
  private seenSection = false;

  constructor(text: string, source: string = INLINE_SOURCE) {
    this.text = text;
    this.source = source;
  }

  parse(): Result<TemplateDocument, AssembleError> {
    const { tokens } = new TemplateLexer(this.text).tokenize();

    for (const token of tokens) {
      const failure = this.consume(token);
      if (failure) {
        return err(failure);
      }
    }

    return ok({
      source: this.source,
      nodes: this.root.body,
      variables: [...this.variables].sort(),
    });
  }

  private get current(): Frame {
    return this.stack.length > 0 ? this.stack[this.stack.length - 1] : this.root;
  }

  private consume(token: TemplateToken): AssembleError | null {
    switch (token.type) {
      case 'BLANK':
        return null;

      case 'COMMENT':
        this.current.body.push({ type: 'comment', text: token.text, line: token.line });
        return null;

      case 'INVALID':
        return this.error(
          token.error.code === 'UNKNOWN_DIRECTIVE' ? 'UnexpectedDirective' : 'MalformedLine',
          token.error.message,
          token.line,
          token.raw
        );

      case 'SECTION':
        return this.section(token.header, token.line, token.raw);

      case 'ENTRY':
        return this.entry(token.key, token.value, token.line, token.raw);

      case 'DIRECTIVE':
        return this.directive(token.keyword, token.argument, token.line, token.raw);

      case 'EOF': {
        const open = this.stack[this.stack.length - 1];
        if (open) {
          return this.error('UnterminatedConditional', "'if' block is never closed with 'endif'", open.line, open.raw);
        }
        return null;
      }
    }
  }

  private section(header: string, line: number, raw: string): AssembleError | null {
    const space = header.search(/\s/);
    const kind = space === -1 ? header : header.slice(0, space);
    const labelText = space === -1 ? '' : header.slice(space + 1).trim();

    if (!SECTION_KIND.test(kind)) {
      return this.error('InvalidSectionHeader', `Invalid section kind '${kind}'`, line, raw);
    }

    let label: ValueSegment[] | null = null;
    if (labelText !== '') {
      const parsed = parseSegments(labelText, line, this.source);
      if (!parsed.ok) {
        return parsed.error;
      }
      label = parsed.value;
      this.collect(label);
    }

    this.seenSection = true;
    this.current.body.push({ type: 'section', kind, label, line, raw });
    return null;
  }

  private entry(key: string, value: string, line: number, raw: string): AssembleError | null {
    if (!this.seenSection) {
      return this.error('EntryOutsideSection', `Entry '${key}' appears before any section header`, line, raw);
    }

    const parsed = parseSegments(value, line, this.source);
    if (!parsed.ok) {
      return parsed.error;
    }

    this.collect(parsed.value);
    this.current.body.push({ type: 'entry', key, value: parsed.value, line, raw });
    return null;
  }

  private directive(
    keyword: 'if' | 'elif' | 'else' | 'endif',
    argument: string,
    line: number,
    raw: string
  ): AssembleError | null {
    const open = this.stack[this.stack.length - 1];

    switch (keyword) {
      case 'if': {
        const predicate = this.predicate(argument, line, raw);
        if (!predicate.ok) {
          return predicate.error;
        }
        const body: TemplateNode[] = [];
        this.stack.push({
          type: 'conditional',
          line,
          raw,
          branches: [{ predicate: predicate.value, body, line }],
          elseBody: null,
          body,
        });
        return null;
      }

      case 'elif': {
        if (!open) {
          return this.error('UnexpectedDirective', "'elif' without a matching 'if'", line, raw);
        }
        if (open.elseBody !== null) {
          return this.error('UnexpectedDirective', "'elif' after 'else'", line, raw);
        }
        const predicate = this.predicate(argument, line, raw);
        if (!predicate.ok) {
          return predicate.error;
        }
        const body: TemplateNode[] = [];
        open.branches.push({ predicate: predicate.value, body, line });
        open.body = body;
        return null;
      }

      case 'else': {
        if (!open) {
          return this.error('UnexpectedDirective', "'else' without a matching 'if'", line, raw);
        }
        if (open.elseBody !== null) {
          return this.error('UnexpectedDirective', "Second 'else' in the same block", line, raw);
        }
        if (argument !== '') {
          return this.error('MalformedLine', "'else' takes no condition", line, raw);
        }
        open.elseBody = [];
        open.body = open.elseBody;
        return null;
      }

      case 'endif': {
        if (!open) {
          return this.error('UnexpectedDirective', "'endif' without a matching 'if'", line, raw);
        }
        if (argument !== '') {
          return this.error('MalformedLine', "'endif' takes no condition", line, raw);
        }
        this.stack.pop();
        const branches: ConditionalBranch[] = open.branches;
        const node: ConditionalNode = {
          type: 'conditional',
          branches,
          elseBody: open.elseBody,
          line: open.line,
          endLine: line,
        };
        this.current.body.push(node);
        return null;
      }
    }
  }

  private predicate(argument: string, line: number, raw: string): Result<Predicate, AssembleError> {
    const predicate = parsePredicate(argument);
    if (!predicate) {
      return err(new AssembleError('InvalidPredicate', `Unsupported condition '${argument}'`, {
        line,
        fragment: raw.trim(),
        source: this.source,
      }));
    }
    for (const name of predicateVariables(predicate)) {
      this.variables.add(name);
    }
    return ok(predicate);
  }

  private collect(segments: readonly ValueSegment[]): void {
    for (const segment of segments) {
      if (segment.type === 'placeholder') {
        this.variables.add(segment.name);
      }
    }
  }

  private error(kind: AssembleErrorKind, message: string, line: number, raw: string): AssembleError {
    return new AssembleError(kind, message, { line, fragment: raw.trim(), source: this.source });
  }
}

/**
 * Parse template text into a document
 */
export function parseTemplate(
  text: string,
  source: string = INLINE_SOURCE
): Result<TemplateDocument, AssembleError> {
  return new TemplateParser(text, source).parse();
}
