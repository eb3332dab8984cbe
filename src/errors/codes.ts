/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the cluster configuration resolver.
 * Provides typed error codes for consistent error handling across the
 * template pipeline, the HTTP API and the CLI.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * HTTP/API Error Codes (4xx, 5xx mapped)
 */
export const HttpErrorCodes = {
  // 400 Bad Request
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',

  // 404 Not Found
  NOT_FOUND: 'NOT_FOUND',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',

  // 413 Payload Too Large
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // 500 Internal Server Error
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const;

export type HttpErrorCode = typeof HttpErrorCodes[keyof typeof HttpErrorCodes];

/**
 * Variable binding error codes
 */
export const BindErrorCodes = {
  /** A required template variable has no input and no default */
  MISSING_REQUIRED_VARIABLE: 'MISSING_REQUIRED_VARIABLE',
  /** A variable source could not be read or has the wrong shape */
  INVALID_VARIABLE_INPUT: 'INVALID_VARIABLE_INPUT',
} as const;

export type BindErrorCode = typeof BindErrorCodes[keyof typeof BindErrorCodes];

/**
 * Template parsing and section assembly error codes
 */
export const TemplateErrorCodes = {
  DUPLICATE_KEY: 'TEMPLATE_DUPLICATE_KEY',
  DUPLICATE_SECTION: 'TEMPLATE_DUPLICATE_SECTION',
  UNTERMINATED_CONDITIONAL: 'TEMPLATE_UNTERMINATED_CONDITIONAL',
  UNEXPECTED_DIRECTIVE: 'TEMPLATE_UNEXPECTED_DIRECTIVE',
  INVALID_PREDICATE: 'TEMPLATE_INVALID_PREDICATE',
  MALFORMED_LINE: 'TEMPLATE_MALFORMED_LINE',
  MALFORMED_MARKER: 'TEMPLATE_MALFORMED_MARKER',
  ENTRY_OUTSIDE_SECTION: 'TEMPLATE_ENTRY_OUTSIDE_SECTION',
  UNBOUND_PLACEHOLDER: 'TEMPLATE_UNBOUND_PLACEHOLDER',
  INVALID_SECTION_HEADER: 'TEMPLATE_INVALID_SECTION_HEADER',
  TEMPLATE_READ_ERROR: 'TEMPLATE_READ_ERROR',
} as const;

export type TemplateErrorCode = typeof TemplateErrorCodes[keyof typeof TemplateErrorCodes];

/**
 * Engine configuration error codes
 */
export const ConfigErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  CONFIG_FILE_ERROR: 'CONFIG_FILE_ERROR',
  CATALOG_ERROR: 'CATALOG_ERROR',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

/**
 * All error codes combined
 */
export const ErrorCodes = {
  ...HttpErrorCodes,
  ...BindErrorCodes,
  ...TemplateErrorCodes,
  ...ConfigErrorCodes,
} as const;

export type ErrorCode =
  | HttpErrorCode
  | BindErrorCode
  | TemplateErrorCode
  | ConfigErrorCode;

// ============================================================================
// Error Code Utilities
// ============================================================================

/**
 * Map error codes to HTTP status codes
 */
export const errorCodeToHttpStatus: Record<ErrorCode, number> = {
  // 400
  [HttpErrorCodes.BAD_REQUEST]: 400,
  [HttpErrorCodes.VALIDATION_ERROR]: 400,
  [HttpErrorCodes.INVALID_INPUT]: 400,

  // 404
  [HttpErrorCodes.NOT_FOUND]: 404,
  [HttpErrorCodes.ROUTE_NOT_FOUND]: 404,

  // 413
  [HttpErrorCodes.PAYLOAD_TOO_LARGE]: 413,

  // 422: the request was well-formed but the template cannot be resolved
  [BindErrorCodes.MISSING_REQUIRED_VARIABLE]: 422,
  [BindErrorCodes.INVALID_VARIABLE_INPUT]: 422,
  [TemplateErrorCodes.DUPLICATE_KEY]: 422,
  [TemplateErrorCodes.DUPLICATE_SECTION]: 422,
  [TemplateErrorCodes.UNTERMINATED_CONDITIONAL]: 422,
  [TemplateErrorCodes.UNEXPECTED_DIRECTIVE]: 422,
  [TemplateErrorCodes.INVALID_PREDICATE]: 422,
  [TemplateErrorCodes.MALFORMED_LINE]: 422,
  [TemplateErrorCodes.MALFORMED_MARKER]: 422,
  [TemplateErrorCodes.ENTRY_OUTSIDE_SECTION]: 422,
  [TemplateErrorCodes.UNBOUND_PLACEHOLDER]: 422,
  [TemplateErrorCodes.INVALID_SECTION_HEADER]: 422,

  // 500
  [HttpErrorCodes.INTERNAL_ERROR]: 500,
  [HttpErrorCodes.UNEXPECTED_ERROR]: 500,
  [TemplateErrorCodes.TEMPLATE_READ_ERROR]: 500,
  [ConfigErrorCodes.CONFIGURATION_ERROR]: 500,
  [ConfigErrorCodes.CONFIG_FILE_ERROR]: 500,
  [ConfigErrorCodes.CATALOG_ERROR]: 500,
};

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCodes));

/**
 * Check whether a string is one of the known error codes
 */
export function isErrorCode(code: string): code is ErrorCode {
  return KNOWN_CODES.has(code);
}

/**
 * Get HTTP status code for an error code
 */
export function getHttpStatusForCode(code: string): number {
  return isErrorCode(code) ? errorCodeToHttpStatus[code] : 500;
}

/**
 * Check if an error code represents a client error (4xx)
 */
export function isClientError(code: string): boolean {
  const status = getHttpStatusForCode(code);
  return status >= 400 && status < 500;
}
