/**
 * AJV JSON Schema for the rewrite payload returned by the model.
 * Plain object schema, matching `RewritePayload`.
 */

export const rewritePayloadSchema = {
  type: 'object' as const,
  properties: {
    optimized_sql: { type: 'string' as const },
    changes: {
      type: 'array' as const,
      items: { type: 'string' as const },
    },
    assumptions: {
      type: 'array' as const,
      items: { type: 'string' as const },
    },
    risk: { type: 'string' as const, enum: ['low', 'medium', 'high'] },
  },
  required: ['optimized_sql', 'changes', 'assumptions', 'risk'] as const,
  additionalProperties: false,
};
