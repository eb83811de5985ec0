import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../../context.js';

const callbackQuerySchema = z.union([
  z.object({ code: z.string().min(1) }),
  z.object({ error: z.string().min(1) }),
]);

/**
 * Google consent onboarding. The callback persists both tokens and the expiry
 * before anything else uses the credential.
 */
export function authRoutes(ctx: Pick<AppContext, 'oauth' | 'principals' | 'tokens'>) {
  const routes = new Hono();

  // GET /api/auth/google/start - Redirect to the Google consent screen
  routes.get('/google/start', (c) => {
    let url: string;
    try {
      url = ctx.oauth.authUrl(c.req.query('state'));
    } catch (error) {
      return c.json({ detail: error instanceof Error ? error.message : String(error) }, 503);
    }
    return c.redirect(url);
  });

  // GET /api/auth/google/callback?code= - Exchange the code and onboard the principal
  routes.get('/google/callback', async (c) => {
    const parsed = callbackQuerySchema.safeParse({
      code: c.req.query('code'),
      error: c.req.query('error'),
    });
    if (!parsed.success) {
      return c.json({ detail: 'Missing authorization code' }, 400);
    }
    if ('error' in parsed.data) {
      return c.json({ detail: `Authorization failed: ${parsed.data.error}` }, 400);
    }

    const grant = await ctx.oauth.exchangeCode(parsed.data.code);
    const email = await ctx.oauth.mailboxAddress(grant.accessToken);
    const principal = await ctx.principals.upsertByEmail(email);
    const credential = await ctx.tokens.storeGrant(principal.id, grant);

    console.log(`✓ Principal ${principal.id} (${email}) authorized`);

    return c.json({
      principal_id: principal.id,
      email,
      status: credential.status,
      expires_at: credential.expiresAt.toISOString(),
      has_refresh_token: credential.refreshToken !== null,
    });
  });

  return routes;
}
