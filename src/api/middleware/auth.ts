import { createMiddleware } from 'hono/factory';
import type { Config } from '../../config/index.js';

/**
 * HTTP Basic Authentication middleware.
 * If credentials are configured, require them.
 * If not configured, all endpoints are public (trusted environment).
 */
export function basicAuth(authConfig: Config['auth']) {
  return createMiddleware(async (c, next) => {
    const { basicUser, basicPassword } = authConfig;

    // No auth configured -- everything is public
    if (!basicUser || !basicPassword) {
      return next();
    }

    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Basic ')) {
      c.header('WWW-Authenticate', 'Basic realm="Mailbox Mirror"');
      return c.json({ detail: 'Unauthorized' }, 401);
    }

    const encoded = authHeader.slice('Basic '.length);
    const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    const username = separator === -1 ? decoded : decoded.slice(0, separator);
    const password = separator === -1 ? '' : decoded.slice(separator + 1);

    if (username !== basicUser || password !== basicPassword) {
      c.header('WWW-Authenticate', 'Basic realm="Mailbox Mirror"');
      return c.json({ detail: 'Unauthorized' }, 401);
    }

    return next();
  });
}
