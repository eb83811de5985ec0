import { Hono } from 'hono';
import type { AppContext } from '../../context.js';

export function healthRoutes(ctx: Pick<AppContext, 'database' | 'config'>) {
  const routes = new Hono();

  // GET /api/health - Health check endpoint (no auth required)
  routes.get('/', (c) => {
    const database = ctx.database.sqlite.open ? 'ok' : 'closed';
    return c.json(
      {
        status: database === 'ok' ? 'ok' : 'degraded',
        database,
        queue: ctx.config.queue.type,
      },
      database === 'ok' ? 200 : 503
    );
  });

  return routes;
}
