import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Identity Manager API',
      version: '1.0.0',
      description: 'Bearer-token identity endpoints and a sample protected resource',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
          description: 'Paste the accessToken returned by the login endpoint',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'UNAUTHORIZED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid email or password',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [
      { name: 'Identity', description: 'Registration, login and token refresh' },
      { name: 'Forecast', description: 'Sample protected resource' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

const baseSpec = swaggerJsdoc(options);

/** Prefix the identity route annotations are written against. */
const ANNOTATED_IDENTITY_PREFIX = '/identity';

/**
 * The OpenAPI document with identity paths moved under the configured prefix.
 */
export function createSwaggerSpec(identityPathPrefix: string): object {
  if (!('paths' in baseSpec) || typeof baseSpec.paths !== 'object' || baseSpec.paths === null) {
    return baseSpec;
  }
  const paths = Object.fromEntries(
    Object.entries(baseSpec.paths).map(([path, item]) => [
      path.startsWith(`${ANNOTATED_IDENTITY_PREFIX}/`)
        ? identityPathPrefix + path.slice(ANNOTATED_IDENTITY_PREFIX.length)
        : path,
      item,
    ])
  );
  return { ...baseSpec, paths };
}
