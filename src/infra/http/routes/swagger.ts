import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { createSwaggerSpec } from '../swagger.js';

/**
 * Interactive docs at /docs and the raw document at /docs.json.
 */
export function createSwaggerRoutes(identityPathPrefix: string) {
  const router = Router();
  const swaggerSpec = createSwaggerSpec(identityPathPrefix);

  router.get('/docs.json', (_req, res) => {
    res.json(swaggerSpec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(swaggerSpec, {
    customCss: '.swagger-ui .topbar { display: none }',
    swaggerOptions: { persistAuthorization: true },
  }));

  return router;
}
