/**
 * Cluster Template Lexer
 * @module parsers/cluster-template/template-lexer
 *
 * Splits template text into one token per line. The template grammar is
 * line-oriented, so classification never looks past the end of a line.
 */

// ============================================================================
// Token Types
// ============================================================================

export type DirectiveKeyword = 'if' | 'elif' | 'else' | 'endif';

const DIRECTIVE_KEYWORDS: ReadonlySet<string> = new Set(['if', 'elif', 'else', 'endif']);

function isDirectiveKeyword(word: string): word is DirectiveKeyword {
  return DIRECTIVE_KEYWORDS.has(word);
}

/**
 * Lexer error details
 */
export interface LexerError {
  readonly message: string;
  readonly line: number;
  readonly raw: string;
  readonly code: 'MALFORMED_LINE' | 'UNKNOWN_DIRECTIVE';
}

/**
 * Token representing one line of the template
 */
export type TemplateToken =
  | { readonly type: 'SECTION'; readonly line: number; readonly raw: string; readonly header: string }
  | { readonly type: 'ENTRY'; readonly line: number; readonly raw: string; readonly key: string; readonly value: string }
  | {
      readonly type: 'DIRECTIVE';
      readonly line: number;
      readonly raw: string;
      readonly keyword: DirectiveKeyword;
      readonly argument: string;
    }
  | { readonly type: 'COMMENT'; readonly line: number; readonly raw: string; readonly text: string }
  | { readonly type: 'BLANK'; readonly line: number; readonly raw: string }
  | { readonly type: 'INVALID'; readonly line: number; readonly raw: string; readonly error: LexerError }
  | { readonly type: 'EOF'; readonly line: number; readonly raw: string };

export type TemplateTokenType = TemplateToken['type'];

/**
 * Lexer result
 */
export interface LexerResult {
  readonly tokens: readonly TemplateToken[];
}

const KEY_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

// ============================================================================
// Template Lexer
// ============================================================================

/**
 * Lexer for cluster configuration templates.
 * Invalid lines become INVALID tokens in place, so the parser reports
 * errors in line order.
 *
 * @example
 * ```typescript
 * const { tokens } = new TemplateLexer(text).tokenize();
 * ```
 */
export class TemplateLexer {
  private readonly input: string;

  constructor(input: string) {
    this.input = input;
  }

  /**
   * Tokenize the entire input
   */
  tokenize(): LexerResult {
    const lines = this.input.split(/\r?\n/);
    // A trailing newline does not start another line
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    const tokens = lines.map((raw, i) => this.classify(raw, i + 1));
    tokens.push({ type: 'EOF', line: lines.length + 1, raw: '' });

    return { tokens };
  }

  private classify(raw: string, line: number): TemplateToken {
    const text = raw.trim();

    if (text === '') {
      return { type: 'BLANK', line, raw };
    }

    if (text.startsWith('#') || text.startsWith(';')) {
      return { type: 'COMMENT', line, raw, text: text.slice(1).trim() };
    }

    if (text.startsWith('{%')) {
      return this.readDirective(text, raw, line);
    }

    if (text.startsWith('[')) {
      if (!text.endsWith(']')) {
        return this.invalid('MALFORMED_LINE', 'Section header is missing its closing bracket', raw, line);
      }
      return { type: 'SECTION', line, raw, header: text.slice(1, -1).trim() };
    }

    const eq = text.indexOf('=');
    if (eq > 0) {
      const key = text.slice(0, eq).trim();
      if (KEY_PATTERN.test(key)) {
        return { type: 'ENTRY', line, raw, key, value: text.slice(eq + 1).trim() };
      }
    }

    return this.invalid('MALFORMED_LINE', 'Expected a section header, an entry or a directive', raw, line);
  }

  private readDirective(text: string, raw: string, line: number): TemplateToken {
    // One directive per line, nothing after the closing %}
    if (!text.endsWith('%}') || text.indexOf('%}') !== text.length - 2) {
      return this.invalid('MALFORMED_LINE', 'Directive must be alone on its line and end with %}', raw, line);
    }

    const inner = text.slice(2, -2).trim();
    const space = inner.search(/\s/);
    const word = space === -1 ? inner : inner.slice(0, space);
    const argument = space === -1 ? '' : inner.slice(space + 1).trim();

    if (!isDirectiveKeyword(word)) {
      return this.invalid('UNKNOWN_DIRECTIVE', `Unknown directive '${word}'`, raw, line);
    }

    return { type: 'DIRECTIVE', line, raw, keyword: word, argument };
  }

  private invalid(
    code: LexerError['code'],
    message: string,
    raw: string,
    line: number
  ): TemplateToken {
    return { type: 'INVALID', line, raw, error: { code, message, raw, line } };
  }
}
