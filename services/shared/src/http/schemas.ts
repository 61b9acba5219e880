// JSON schema fragments shared by the API services

export const errorResponseSchema = {
     type: 'object',
     properties: {
          error: { type: 'string', example: 'INVALID_TRANSITION' },
          message: { type: 'string' },
     },
} as const;

export function errorResponses(...codes: Array<400 | 404 | 409 | 500>): Record<number, unknown> {
     const descriptions: Record<number, string> = {
          400: 'Invalid request',
          404: 'Not found',
          409: 'Conflict with the current state',
          500: 'Internal server error',
     };
     const responses: Record<number, unknown> = {};
     for (const code of codes) {
          responses[code] = { description: descriptions[code], ...errorResponseSchema };
     }
     return responses;
}

export function idParams(name: string) {
     return {
          type: 'object',
          required: [name],
          properties: {
               [name]: { type: 'integer', minimum: 1 },
          },
     };
}

/** Object whose properties are serialized as they are */
export const openObject = { type: 'object', additionalProperties: true } as const;
