import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../../context.js';
import { NotFoundError } from '../../shared/errors.js';
import type { MessageFolder, MessageRecord, SyncResult } from '../../shared/types/api.js';
import type { LabelDelta } from '../../services/gmail/flags.js';
import { failureResponse } from '../errors.js';

type PrincipalsContext = Pick<
  AppContext,
  'principals' | 'messages' | 'syncEngine' | 'sendService' | 'flags' | 'queue' | 'tokens'
>;

const idParamSchema = z.coerce.number().int().positive();

const syncQuerySchema = z.object({
  max: z.coerce.number().int().positive().optional(),
  reconcile: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
});

const sendBodySchema = z.object({
  to: z.string().min(1),
  subject: z.string().default(''),
  body: z.string(),
});

const booleanQuery = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true')
  .optional();

const listQuerySchema = z.object({
  folder: z.enum(['inbox', 'archive', 'sent', 'drafts', 'spam', 'trash']).optional(),
  read: booleanQuery,
  starred: booleanQuery,
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().nonnegative().default(0),
});

const flagFields = {
  read: z.boolean().optional(),
  starred: z.boolean().optional(),
  folder: z.enum(['inbox', 'archive', 'trash', 'spam']).optional(),
};

function hasChange(v: { read?: boolean; starred?: boolean; folder?: string }): boolean {
  return v.read !== undefined || v.starred !== undefined || v.folder !== undefined;
}

const NO_CHANGE = { message: 'At least one of read, starred or folder is required' };

const flagsBodySchema = z.object(flagFields).refine(hasChange, NO_CHANGE);

const bulkFlagsBodySchema = z
  .object({ ids: z.array(z.string().min(1)).min(1).max(100), ...flagFields })
  .refine(hasChange, NO_CHANGE);

function serializeSyncResult(result: SyncResult) {
  return {
    fetched: result.fetched,
    ingested: result.ingested,
    reconciled: result.reconciled,
    errors: result.errors,
    reauth_required: result.reauthRequired,
    aborted: result.aborted,
    cancelled: result.cancelled,
    cursor: result.cursor
      ? {
          head_message_id: result.cursor.headMessageId,
          last_message_id: result.cursor.lastMessageId,
          backfill_pending: result.cursor.backfill.length,
          updated_at: result.cursor.updatedAt.toISOString(),
        }
      : null,
  };
}

function serializeMessage(message: MessageRecord) {
  return {
    provider_message_id: message.providerMessageId,
    thread_id: message.threadId,
    subject: message.subject,
    sender: message.sender,
    recipients: message.recipients,
    folder: message.folder,
    is_read: message.isRead,
    is_starred: message.isStarred,
    labels: message.labels,
    direction: message.direction,
    received_at: message.receivedAt.toISOString(),
  };
}

function serializeMessageDetail(message: MessageRecord) {
  return {
    ...serializeMessage(message),
    snippet: message.snippet,
    body: message.body,
    category: message.category,
    summary: message.summary,
    sentiment: message.sentiment,
    ingested_at: message.ingestedAt.toISOString(),
  };
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

function issues(error: z.ZodError): string {
  return error.issues.map((i) => i.message).join('; ');
}

export function principalRoutes(ctx: PrincipalsContext) {
  const routes = new Hono();

  async function loadPrincipal(c: Context) {
    const id = idParamSchema.safeParse(c.req.param('id'));
    if (!id.success) return null;
    return ctx.principals.get(id.data);
  }

  // POST /api/principals/:id/sync - Run a sync inline and report the result
  routes.post('/:id/sync', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    const query = syncQuerySchema.safeParse({
      max: c.req.query('max'),
      reconcile: c.req.query('reconcile'),
    });
    if (!query.success) {
      return c.json({ detail: issues(query.error) }, 400);
    }

    const result = await ctx.syncEngine.syncPrincipal(principal.id, {
      maxMessages: query.data.max,
      reconcileFlags: query.data.reconcile,
      signal: c.req.raw.signal,
    });

    if (result.reauthRequired) {
      return c.json(serializeSyncResult(result), 409);
    }
    if (result.aborted) {
      return c.json(serializeSyncResult(result), 503);
    }
    return c.json(serializeSyncResult(result));
  });

  // POST /api/principals/:id/sync/enqueue - Queue a background sync
  routes.post('/:id/sync/enqueue', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    if (await ctx.queue.hasPendingJob(principal.id, 'sync')) {
      return c.json({ queued: false, detail: 'A sync is already pending' });
    }

    const jobId = await ctx.queue.enqueue('sync', principal.id, {});
    return c.json({ queued: true, job_id: jobId });
  });

  // POST /api/principals/:id/messages/send - Send a plain-text message
  routes.post('/:id/messages/send', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    const body = sendBodySchema.safeParse(await readJson(c));
    if (!body.success) {
      return c.json({ detail: issues(body.error) }, 400);
    }

    const outcome = await ctx.sendService.sendMessage(
      principal.id,
      body.data.to,
      body.data.subject,
      body.data.body
    );
    if (outcome.status !== 'ok') {
      return failureResponse(c, outcome);
    }

    return c.json({ message: serializeMessage(outcome.value) });
  });

  // GET /api/principals/:id/messages - Mirrored messages, newest first
  routes.get('/:id/messages', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    const query = listQuerySchema.safeParse({
      folder: c.req.query('folder'),
      read: c.req.query('read'),
      starred: c.req.query('starred'),
      limit: c.req.query('limit'),
      offset: c.req.query('offset'),
    });
    if (!query.success) {
      return c.json({ detail: issues(query.error) }, 400);
    }

    const { folder, read, starred, limit, offset } = query.data;
    const listing = await ctx.messages.list(principal.id, {
      folder,
      isRead: read,
      isStarred: starred,
      limit,
      offset,
    });

    return c.json({
      messages: listing.messages.map((m) => ({ ...serializeMessage(m), snippet: m.snippet })),
      total: listing.total,
      limit,
      offset,
    });
  });

  // GET /api/principals/:id/messages/stats - Counts per folder
  routes.get('/:id/messages/stats', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    return c.json(await ctx.messages.stats(principal.id));
  });

  // GET /api/principals/:id/messages/:providerId - One mirrored message with its body
  routes.get('/:id/messages/:providerId', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    const message = await ctx.messages.findByProviderId(principal.id, c.req.param('providerId'));
    if (!message) {
      return c.json({ detail: 'Message not found' }, 404);
    }
    return c.json({ message: serializeMessageDetail(message) });
  });

  async function enqueuePush(principalId: number, providerMessageId: string, delta: LabelDelta) {
    if (delta.add.length === 0 && delta.remove.length === 0) {
      return null;
    }
    return ctx.queue.enqueue('push_flags', principalId, {
      provider_message_id: providerMessageId,
      add: delta.add,
      remove: delta.remove,
    });
  }

  // POST /api/principals/:id/messages/flags - Same change for several messages
  routes.post('/:id/messages/flags', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    const body = bulkFlagsBodySchema.safeParse(await readJson(c));
    if (!body.success) {
      return c.json({ detail: issues(body.error) }, 400);
    }

    const { ids, ...change } = body.data;
    const updated: Array<{
      provider_message_id: string;
      is_read: boolean;
      is_starred: boolean;
      folder: MessageFolder;
      job_id: number | null;
    }> = [];
    const missing: string[] = [];

    for (const providerMessageId of ids) {
      try {
        const { flags, delta } = await ctx.flags.applyLocal(principal.id, providerMessageId, change);
        updated.push({
          provider_message_id: providerMessageId,
          is_read: flags.isRead,
          is_starred: flags.isStarred,
          folder: flags.folder,
          job_id: await enqueuePush(principal.id, providerMessageId, delta),
        });
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        missing.push(providerMessageId);
      }
    }

    return c.json({ updated, missing });
  });

  // POST /api/principals/:id/messages/:providerId/flags - Change flags locally, push in background
  routes.post('/:id/messages/:providerId/flags', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    const body = flagsBodySchema.safeParse(await readJson(c));
    if (!body.success) {
      return c.json({ detail: issues(body.error) }, 400);
    }

    const providerMessageId = c.req.param('providerId');
    const { flags, delta } = await ctx.flags.applyLocal(principal.id, providerMessageId, body.data);
    const jobId = await enqueuePush(principal.id, providerMessageId, delta);

    return c.json({
      is_read: flags.isRead,
      is_starred: flags.isStarred,
      folder: flags.folder,
      labels: flags.labels,
      job_id: jobId,
    });
  });

  // GET /api/principals/:id/token - Credential diagnostics (the token itself is never returned)
  routes.get('/:id/token', async (c) => {
    const principal = await loadPrincipal(c);
    if (!principal) {
      return c.json({ detail: 'Principal not found' }, 404);
    }

    const outcome = await ctx.tokens.getValidToken(principal.id);
    const credential = await ctx.tokens.inspect(principal.id);

    return c.json({
      outcome: outcome.status,
      error: outcome.status === 'ok' ? null : outcome.error.code,
      reauth_required: outcome.status === 'needs_reauth',
      status: credential.status,
      expires_at: credential.expiresAt ? credential.expiresAt.toISOString() : null,
      has_refresh_token: credential.hasRefreshToken,
      scope: credential.scope,
    });
  });

  return routes;
}
