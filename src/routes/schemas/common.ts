/**
 * Common API Schemas
 * @module routes/schemas/common
 *
 * Shared TypeBox schemas for error and health responses.
 */

import { Type, Static } from '@sinclair/typebox';

// ============================================================================
// Error Schemas
// ============================================================================

/**
 * API Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number({ description: 'HTTP status code' }),
  error: Type.String({ description: 'Error type' }),
  message: Type.String({ description: 'Human-readable error message' }),
  code: Type.String({ description: 'Error code for programmatic handling' }),
  details: Type.Optional(Type.Unknown({ description: 'Additional error details' })),
  requestId: Type.Optional(Type.String()),
  timestamp: Type.String({ format: 'date-time' }),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

// ============================================================================
// Health Schemas
// ============================================================================

export const HealthCheckSchema = Type.Object({
  status: Type.Union([Type.Literal('healthy'), Type.Literal('degraded'), Type.Literal('unhealthy')]),
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.String(),
  uptime: Type.Number({ description: 'Seconds since start' }),
});

export type HealthCheck = Static<typeof HealthCheckSchema>;
