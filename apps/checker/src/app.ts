import { Hono } from 'hono';

import { handleError, handleNotFound } from './middleware/errors';
import { createCheckRoutes, type CheckRoutesDeps } from './routes/checks';

export type AppDeps = CheckRoutesDeps;

export function createApp(deps: AppDeps) {
  const app = new Hono();

  app.onError(handleError);
  app.notFound(handleNotFound);

  app.get('/', (c) => c.text('ok'));
  app.get('/healthz', (c) => c.json({ ok: true }));

  const checkRoutes = createCheckRoutes(deps);
  app.route('/api/v1/checks', checkRoutes);
  // Single-endpoint deployments post straight to /api.
  app.route('/api', checkRoutes);

  return app;
}
