import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { AppContext } from '../context.js';
import { MailError } from '../shared/errors.js';
import { basicAuth } from './middleware/auth.js';
import { errorResponse } from './errors.js';
import { healthRoutes } from './routes/health.js';
import { authRoutes } from './routes/auth.js';
import { principalRoutes } from './routes/principals.js';

export function createApp(ctx: AppContext, options: { logRequests?: boolean } = {}) {
  const app = new Hono();

  // Middleware
  if (options.logRequests ?? true) {
    app.use('*', logger());
  }

  // Public routes (no auth required)
  app.route('/api/health', healthRoutes(ctx));
  app.route('/api/auth', authRoutes(ctx));

  // Protected routes (auth required)
  app.use('/api/principals/*', basicAuth(ctx.config.auth));
  app.route('/api/principals', principalRoutes(ctx));

  app.onError((error, c) => {
    if (error instanceof MailError) {
      return errorResponse(c, error);
    }
    console.error('Unhandled error:', error);
    return c.json({ detail: 'Internal server error' }, 500);
  });

  return app;
}
