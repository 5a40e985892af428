import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from '../swagger.js';

/**
 * Interactive docs at /docs and the raw document at /docs.json.
 */
export function createSwaggerRoutes() {
  const router = Router();

  router.get('/docs.json', (_req, res) => {
    res.json(swaggerSpec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(swaggerSpec, {
    customSiteTitle: 'Blog API',
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
