import { Hono } from 'hono';

import { runCheckBatch, serializeCheckReport, type CheckBatchDeps } from '../checks/batch';
import { requireApiKey } from '../middleware/auth';
import { AppError } from '../middleware/errors';
import { checkBatchInputSchema } from '../schemas/check-batch';

export type CheckRoutesDeps = CheckBatchDeps & {
  apiKey: string | undefined;
};

export function createCheckRoutes(deps: CheckRoutesDeps) {
  const routes = new Hono();

  routes.post('/', requireApiKey(deps.apiKey), async (c) => {
    const rawBody = await c.req.json().catch(() => {
      throw new AppError(400, 'INVALID_ARGUMENT', 'Invalid request body');
    });

    const input = checkBatchInputSchema.parse(rawBody);

    const results = await runCheckBatch(deps, input);
    const body = serializeCheckReport(results);

    return c.body(body, 200, { 'Content-Type': 'application/json' });
  });

  routes.all('/', (c) => {
    c.header('Allow', 'POST');
    throw new AppError(405, 'METHOD_NOT_ALLOWED', 'Invalid request method');
  });

  return routes;
}
