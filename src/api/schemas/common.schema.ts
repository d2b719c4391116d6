export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
  },
  required: ['error', 'message'],
} as const;

export const errorResponses = {
  400: errorResponseSchema,
  500: errorResponseSchema,
} as const;

export const detectionRecordsSchema = {
  type: 'array',
  items: { type: 'object' },
} as const;
