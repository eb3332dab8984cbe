/**
 * Error Handling Module
 * @module errors
 *
 * Error classes, codes and helpers for the cluster configuration resolver.
 */

export {
  HttpErrorCodes,
  BindErrorCodes,
  TemplateErrorCodes,
  ConfigErrorCodes,
  ErrorCodes,
  errorCodeToHttpStatus,
  getHttpStatusForCode,
  isClientError,
  isErrorCode,
  type ErrorCode,
  type HttpErrorCode,
  type BindErrorCode,
  type TemplateErrorCode,
  type ConfigErrorCode,
} from './codes.js';

export {
  BaseError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  wrapError,
  getErrorMessage,
  type ErrorContext,
  type SerializedError,
} from './base.js';

export {
  BindError,
  AssembleError,
  ConfigurationError,
  UsageError,
  TemplateReadError,
  type BindErrorKind,
  type AssembleErrorKind,
  type TemplateLocation,
} from './domain.js';
