/**
 * Config API Schemas
 * @module routes/schemas/configs
 *
 * TypeBox schemas for template rendering and config validation.
 */

import { Type, Static } from '@sinclair/typebox';

// ============================================================================
// Validation Report
// ============================================================================

export const ValidationErrorSchema = Type.Object({
  kind: Type.Union([
    Type.Literal('reference'),
    Type.Literal('enum'),
    Type.Literal('range'),
    Type.Literal('format'),
    Type.Literal('required'),
    Type.Literal('partition'),
  ]),
  rule: Type.String(),
  section: Type.String(),
  field: Type.String(),
  message: Type.String(),
  value: Type.Optional(Type.String()),
  expected: Type.Optional(Type.String()),
});

export const ValidationWarningSchema = Type.Object({
  rule: Type.String(),
  section: Type.String(),
  field: Type.Optional(Type.String()),
  message: Type.String(),
});

export const CrossReferenceSchema = Type.Object({
  section: Type.String(),
  field: Type.String(),
  targetKind: Type.String(),
  targetLabel: Type.String(),
  targetIndex: Type.Integer({ minimum: 0 }),
});

export const ValidationReportSchema = Type.Object({
  valid: Type.Boolean(),
  errors: Type.Array(ValidationErrorSchema),
  warnings: Type.Array(ValidationWarningSchema),
  references: Type.Array(CrossReferenceSchema),
});

/** Section name -> key -> value, in template order */
export const SectionMapSchema = Type.Record(Type.String(), Type.Record(Type.String(), Type.String()));

// ============================================================================
// Render
// ============================================================================

export const RenderRequestSchema = Type.Object({
  template: Type.Optional(Type.String({
    minLength: 1,
    description: 'Template text; the built-in template when omitted',
  })),
  variables: Type.Record(Type.String({ pattern: '^[A-Za-z_][A-Za-z0-9_]*$' }), Type.String(), {
    description: 'Template variable values',
  }),
}, { additionalProperties: false });

export type RenderRequestBody = Static<typeof RenderRequestSchema>;

export const RenderResponseSchema = Type.Object({
  text: Type.String(),
  sections: SectionMapSchema,
  activeCluster: Type.Union([Type.String(), Type.Null()]),
  report: ValidationReportSchema,
});

export type RenderResponse = Static<typeof RenderResponseSchema>;

// ============================================================================
// Validate
// ============================================================================

export const ValidateRequestSchema = Type.Object({
  config: Type.String({ description: 'Resolved configuration text' }),
}, { additionalProperties: false });

export type ValidateRequestBody = Static<typeof ValidateRequestSchema>;

export const ValidateResponseSchema = Type.Object({
  sections: SectionMapSchema,
  activeCluster: Type.Union([Type.String(), Type.Null()]),
  report: ValidationReportSchema,
});

export type ValidateResponse = Static<typeof ValidateResponseSchema>;
