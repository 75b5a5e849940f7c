// src/app.ts
import express from 'express';
import swaggerUi from 'swagger-ui-express';

import { createApiV1, type ApiV1Options } from './api_v1.js';
import { openapi } from './openapi.js';

export function createApp(opts: ApiV1Options): express.Express {
  const app = express();
  app.set('etag', false);

  // ===== v1 REST =====
  app.use('/v1', createApiV1(opts));

  // ===== OpenAPI JSON (no-store + deep clone to keep the module object intact) =====
  app.get('/openapi.json', (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json(JSON.parse(JSON.stringify(openapi)));
  });

  // Swagger HTML is not cached either
  const noStore = (_req: express.Request, res: express.Response, next: express.NextFunction) => {
    res.set('Cache-Control', 'no-store');
    next();
  };

  app.use(
    '/docs',
    noStore,
    swaggerUi.serve,
    swaggerUi.setup(undefined, {
      explorer: true,
      customSiteTitle: 'Zone Monitor — Reporting API',
      swaggerUrl: '/openapi.json',
    })
  );

  return app;
}
