/**
 * Global Error Handler Middleware
 * @module middleware/error-handler
 *
 * Maps domain errors to HTTP responses through the error-code table and
 * logs each failure with its request context.
 */

import { FastifyInstance, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { isBaseError } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';

// ============================================================================
// Error Response Types
// ============================================================================

interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  code: string;
  details?: unknown;
  requestId?: string;
  timestamp: string;
  stack?: string;
}

// ============================================================================
// Error Formatting
// ============================================================================

function formatError(error: FastifyError | Error, requestId: string, isProduction: boolean): ErrorResponse {
  if (isBaseError(error)) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.code,
      details: error.context.details,
      requestId,
      timestamp: error.timestamp.toISOString(),
    };
  }

  // Request schema validation
  if ('validation' in error && error.validation) {
    return {
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      code: 'VALIDATION_ERROR',
      details: isProduction ? undefined : error.validation,
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  // Fastify errors carry their own status (413 body too large, 415, ...)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.statusCode === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST',
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: isProduction ? 'An unexpected error occurred' : error.message,
    code: 'INTERNAL_ERROR',
    requestId,
    timestamp: new Date().toISOString(),
  };
}

function getHttpErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    413: 'Payload Too Large',
    415: 'Unsupported Media Type',
    422: 'Unprocessable Entity',
    500: 'Internal Server Error',
  };
  return names[statusCode] ?? 'Error';
}

// ============================================================================
// Error Handler Options
// ============================================================================

export interface ErrorHandlerOptions {
  /** Include stack traces in 5xx responses */
  includeStackTraces?: boolean;
  /** Log every error */
  logErrors?: boolean;
  /** Hide internal messages and validation details */
  production?: boolean;
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

async function errorHandlerPlugin(
  fastify: FastifyInstance,
  options: ErrorHandlerOptions
): Promise<void> {
  const production = options.production ?? process.env.NODE_ENV === 'production';
  const includeStackTraces = options.includeStackTraces ?? !production;
  const logErrors = options.logErrors ?? true;
  const logger = createModuleLogger('error-handler');

  fastify.setErrorHandler(
    async (error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
      const formatted = formatError(error, request.id, production);

      if (logErrors) {
        const logContext = {
          err: error,
          requestId: request.id,
          method: request.method,
          url: request.url,
          statusCode: formatted.statusCode,
          code: formatted.code,
        };
        if (formatted.statusCode >= 500) {
          logger.error(logContext, 'Server error');
        } else {
          logger.warn(logContext, 'Client error');
        }
      }

      if (includeStackTraces && formatted.statusCode >= 500) {
        formatted.stack = error.stack;
      }

      return reply.status(formatted.statusCode).send(formatted);
    }
  );

  fastify.setNotFoundHandler(
    async (request: FastifyRequest, reply: FastifyReply) => {
      if (logErrors) {
        logger.warn({ method: request.method, url: request.url, requestId: request.id }, 'Route not found');
      }

      return reply.status(404).send({
        statusCode: 404,
        error: 'Not Found',
        message: `Route ${request.method} ${request.url} not found`,
        code: 'ROUTE_NOT_FOUND',
        requestId: request.id,
        timestamp: new Date().toISOString(),
      });
    }
  );
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '4.x',
});
