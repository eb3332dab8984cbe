/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised by the resolution pipeline. Binding and assembly stop at the
 * first failure, so each error carries enough to point at the offending
 * variable or template line.
 */

import { BaseError, ErrorContext } from './base.js';
import {
  BindErrorCodes,
  ConfigErrorCode,
  ConfigErrorCodes,
  HttpErrorCodes,
  TemplateErrorCode,
  TemplateErrorCodes,
} from './codes.js';

// ============================================================================
// Bind Errors
// ============================================================================

export type BindErrorKind = 'MissingRequired' | 'InvalidInput';

/**
 * Raised when variables cannot be bound against a template schema
 */
export class BindError extends BaseError {
  public readonly kind: BindErrorKind;
  /** Offending variable name (or the raw flag/source for InvalidInput) */
  public readonly variable: string;

  constructor(
    kind: BindErrorKind,
    variable: string,
    message: string,
    context: ErrorContext = {}
  ) {
    super(
      message,
      kind === 'MissingRequired'
        ? BindErrorCodes.MISSING_REQUIRED_VARIABLE
        : BindErrorCodes.INVALID_VARIABLE_INPUT,
      { ...context, details: { kind, variable, ...context.details } }
    );
    this.name = 'BindError';
    this.kind = kind;
    this.variable = variable;
  }

  static missingRequired(variable: string): BindError {
    return new BindError(
      'MissingRequired',
      variable,
      `Missing required variable: ${variable}`
    );
  }

  static invalidInput(variable: string, reason: string, source?: string): BindError {
    return new BindError(
      'InvalidInput',
      variable,
      source ? `Invalid variable input from ${source}: ${reason}` : `Invalid variable input: ${reason}`,
      { source }
    );
  }
}

// ============================================================================
// Assemble Errors
// ============================================================================

export type AssembleErrorKind =
  | 'DuplicateKey'
  | 'DuplicateSection'
  | 'UnterminatedConditional'
  | 'UnexpectedDirective'
  | 'InvalidPredicate'
  | 'MalformedLine'
  | 'MalformedMarker'
  | 'EntryOutsideSection'
  | 'UnboundPlaceholder'
  | 'InvalidSectionHeader';

const ASSEMBLE_ERROR_CODES: Record<AssembleErrorKind, TemplateErrorCode> = {
  DuplicateKey: TemplateErrorCodes.DUPLICATE_KEY,
  DuplicateSection: TemplateErrorCodes.DUPLICATE_SECTION,
  UnterminatedConditional: TemplateErrorCodes.UNTERMINATED_CONDITIONAL,
  UnexpectedDirective: TemplateErrorCodes.UNEXPECTED_DIRECTIVE,
  InvalidPredicate: TemplateErrorCodes.INVALID_PREDICATE,
  MalformedLine: TemplateErrorCodes.MALFORMED_LINE,
  MalformedMarker: TemplateErrorCodes.MALFORMED_MARKER,
  EntryOutsideSection: TemplateErrorCodes.ENTRY_OUTSIDE_SECTION,
  UnboundPlaceholder: TemplateErrorCodes.UNBOUND_PLACEHOLDER,
  InvalidSectionHeader: TemplateErrorCodes.INVALID_SECTION_HEADER,
};

/**
 * Where in a template an assembly error was found
 */
export interface TemplateLocation {
  /** 1-based line number, null when the error has no single line */
  line: number | null;
  /** Raw text of the offending line or marker */
  fragment: string;
  /** Template source name (file path or '<inline>') */
  source: string;
}

/**
 * Raised when a template is malformed or cannot be assembled
 */
export class AssembleError extends BaseError {
  public readonly kind: AssembleErrorKind;
  public readonly location: TemplateLocation;

  constructor(kind: AssembleErrorKind, message: string, location: TemplateLocation) {
    super(formatLocated(message, location), ASSEMBLE_ERROR_CODES[kind], {
      source: location.source,
      details: { kind, line: location.line, fragment: location.fragment, source: location.source },
    });
    this.name = 'AssembleError';
    this.kind = kind;
    this.location = location;
  }

  get line(): number | null {
    return this.location.line;
  }

  get fragment(): string {
    return this.location.fragment;
  }
}

function formatLocated(message: string, location: TemplateLocation): string {
  return location.line === null
    ? `${location.source}: ${message}`
    : `${location.source}:${location.line}: ${message}`;
}

// ============================================================================
// Engine Errors
// ============================================================================

/**
 * Raised when the engine's own configuration is invalid or unreadable
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;

  constructor(
    configKey: string,
    message?: string,
    context: ErrorContext = {},
    code: ConfigErrorCode = ConfigErrorCodes.CONFIGURATION_ERROR
  ) {
    super(
      message ?? `Invalid or missing configuration: ${configKey}`,
      code,
      context,
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Raised for malformed command lines and request bodies
 */
export class UsageError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, HttpErrorCodes.BAD_REQUEST, context);
    this.name = 'UsageError';
  }
}

/**
 * Raised when a template or config file cannot be read
 */
export class TemplateReadError extends BaseError {
  public readonly filePath: string;

  constructor(filePath: string, cause: Error) {
    super(`Failed to read ${filePath}: ${cause.message}`, TemplateErrorCodes.TEMPLATE_READ_ERROR, {
      cause,
      source: filePath,
    });
    this.name = 'TemplateReadError';
    this.filePath = filePath;
  }
}
