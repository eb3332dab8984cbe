/**
 * Cluster Template Parser Module
 * @module parsers/cluster-template
 */

export {
  TemplateLexer,
  type TemplateToken,
  type TemplateTokenType,
  type DirectiveKeyword,
  type LexerError,
  type LexerResult,
} from './template-lexer.js';

export {
  TemplateParser,
  parseTemplate,
  parseSegments,
  parsePredicate,
  predicateVariables,
  INLINE_SOURCE,
} from './template-parser.js';

export type {
  ValueSegment,
  Predicate,
  SectionHeaderNode,
  EntryNode,
  CommentNode,
  ConditionalBranch,
  ConditionalNode,
  TemplateNode,
  TemplateDocument,
} from './types.js';
