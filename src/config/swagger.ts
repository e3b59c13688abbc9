import swaggerJsdoc from 'swagger-jsdoc';
import { Express } from 'express';
import swaggerUi from 'swagger-ui-express';
import { Settings } from './settings';

type DocsSettings = Pick<Settings, 'environment' | 'port'>;

/** Route annotations under src/routes are written relative to this prefix. */
export const API_PREFIX = '/api/v1';

const errorSchema = {
  type: 'object',
  required: ['success', 'message', 'code'],
  properties: {
    success: { type: 'boolean', example: false },
    message: { type: 'string' },
    code: {
      type: 'string',
      enum: ['VALIDATION_ERROR', 'UNAUTHORIZED', 'FORBIDDEN', 'NOT_FOUND', 'CONFLICT', 'TOO_MANY_REQUESTS', 'INTERNAL_ERROR'],
    },
    details: {
      type: 'object',
      description: 'Field name to messages; present on validation failures.',
      additionalProperties: { type: 'array', items: { type: 'string' } },
    },
  },
};

const listSchema = {
  type: 'object',
  properties: {
    count: { type: 'integer' },
    items: { type: 'array', items: { type: 'object' } },
  },
};

export function buildApiDocs(settings: DocsSettings): object {
  const origin = (process.env.SWAGGER_SERVER_URL || `http://localhost:${settings.port}`).trim().replace(/\/+$/, '');

  return swaggerJsdoc({
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'Campus Registry API',
        version: '1.0.0',
        description: 'Students, staff, department heads, notices and the subject catalog.',
      },
      servers: [{ url: `${origin}${API_PREFIX}`, description: `${settings.environment} server` }],
      components: {
        securitySchemes: {
          bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
        },
        schemas: { Error: errorSchema, List: listSchema },
      },
      security: [{ bearerAuth: [] }],
    },
    apis: ['./src/routes/**/*.ts'],
  });
}

export const setupSwagger = (app: Express, settings: DocsSettings): void => {
  const docs = buildApiDocs(settings);
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(docs));
  app.get('/docs.json', (_req, res) => {
    res.json(docs);
  });
};
