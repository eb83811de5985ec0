import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { schema } from '../../../src/db/index.js';
import { GmailProviderClient } from '../../../src/services/gmail/client.js';
import { SendService, snippetOf } from '../../../src/services/gmail/send.js';
import { MailboxSyncEngine } from '../../../src/services/gmail/sync.js';
import { TokenLifecycleManager } from '../../../src/services/gmail/tokens.js';
import { FakeGmailApi, ScriptedRefresher, httpError } from '../../helpers/mock-clients.js';
import {
  NOW,
  createAuthorizedPrincipal,
  createTestStore,
  type TestStore,
} from '../../helpers/test-fixtures.js';

async function waitFor(condition: () => boolean): Promise<void> {
  while (!condition()) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

describe('SendService', () => {
  let store: TestStore;
  let api: FakeGmailApi;
  let refresher: ScriptedRefresher;
  let tokens: TokenLifecycleManager;
  let provider: GmailProviderClient;
  let service: SendService;

  beforeEach(() => {
    store = createTestStore();
    api = new FakeGmailApi();
    refresher = new ScriptedRefresher(() => NOW);
    tokens = new TokenLifecycleManager(store.credentials, refresher, { now: () => NOW });
    provider = new GmailProviderClient(api, { maxRetries: 3, sleep: async () => {} });
    service = new SendService(tokens, provider, store.principals, store.messages, () => NOW);
  });

  afterEach(() => {
    store.handle.close();
  });

  it('should send and store the outbound copy', async () => {
    const { principalId } = await createAuthorizedPrincipal(store);

    const outcome = await service.sendMessage(principalId, 'bob@example.com', 'Hello', 'Hi Bob,\n\n  see you   soon');

    assert.deepStrictEqual(outcome, {
      status: 'ok',
      value: {
        principalId,
        providerMessageId: 'sent-1',
        threadId: 'thread-sent-1',
        subject: 'Hello',
        sender: 'test@example.com',
        recipients: 'bob@example.com',
        snippet: 'Hi Bob, see you soon',
        body: 'Hi Bob,\n\n  see you   soon',
        receivedAt: NOW,
        isRead: true,
        isStarred: false,
        folder: 'sent',
        labels: ['SENT'],
        direction: 'outbound',
        category: null,
        summary: null,
        sentiment: null,
        ingestedAt: NOW,
      },
    });

    const text = Buffer.from(api.sentRaw[0], 'base64url').toString('utf-8');
    assert.ok(text.startsWith('From: test@example.com\r\nTo: bob@example.com\r\nSubject: Hello\r\n'));
    assert.strictEqual(await store.messages.existsByProviderId(principalId, 'sent-1'), true);
  });

  it('should not fetch the sent message again on the next sync', async () => {
    const { principalId } = await createAuthorizedPrincipal(store);
    await service.sendMessage(principalId, 'bob@example.com', 'Hello', 'Hi');

    const engine = new MailboxSyncEngine(tokens, provider, store.messages, { now: () => NOW });
    const result = await engine.syncPrincipal(principalId);

    assert.strictEqual(result.fetched, 0);
    assert.strictEqual(result.cursor?.headMessageId, 'sent-1');
    assert.strictEqual(api.count('get'), 0);
  });

  it('should use a refreshed token when the stored one is stale', async () => {
    const { principalId } = await createAuthorizedPrincipal(store, { credential: { expiresAt: NOW } });

    const outcome = await service.sendMessage(principalId, 'bob@example.com', 'Hello', 'Hi');

    assert.strictEqual(outcome.status, 'ok');
    assert.deepStrictEqual(api.tokensSeen, ['access-1']);
  });

  it('should share the refresh a running sync started', async () => {
    const { principalId } = await createAuthorizedPrincipal(store, { credential: { expiresAt: NOW } });
    const engine = new MailboxSyncEngine(tokens, provider, store.messages, { now: () => NOW });

    refresher.hold();
    const sync = engine.syncPrincipal(principalId);
    await waitFor(() => refresher.calls.length === 1);

    const send = service.sendMessage(principalId, 'bob@example.com', 'Hello', 'Hi');
    refresher.release();
    const [synced, sent] = await Promise.all([sync, send]);

    assert.strictEqual(synced.aborted, false);
    assert.strictEqual(sent.status, 'ok');
    assert.strictEqual(refresher.calls.length, 1);
    assert.deepStrictEqual([...new Set(api.tokensSeen)], ['access-1']);
  });

  it('should not send for a principal that must re-authorize', async () => {
    const { principalId } = await createAuthorizedPrincipal(store, { credential: { status: 'NEEDS_REAUTH' } });

    const outcome = await service.sendMessage(principalId, 'bob@example.com', 'Hello', 'Hi');

    assert.strictEqual(outcome.status, 'needs_reauth');
    assert.strictEqual(api.count('send'), 0);
  });

  it('should report a transient failure without retrying or storing', async () => {
    const { principalId } = await createAuthorizedPrincipal(store);
    api.failNext('send', httpError(503));

    const outcome = await service.sendMessage(principalId, 'bob@example.com', 'Hello', 'Hi');

    assert.strictEqual(outcome.status, 'retryable');
    assert.strictEqual(api.count('send'), 1);
    const rows = await store.handle.db.select().from(schema.messages);
    assert.strictEqual(rows.length, 0);
  });

  it('should demote the credential when the token is revoked', async () => {
    const { principalId } = await createAuthorizedPrincipal(store);
    api.failNext('send', httpError(401));

    const outcome = await service.sendMessage(principalId, 'bob@example.com', 'Hello', 'Hi');

    assert.strictEqual(outcome.status, 'needs_reauth');
    assert.strictEqual((await store.credentials.get(principalId))?.status, 'NEEDS_REAUTH');
  });

  it('should reject a message without recipient', async () => {
    const { principalId } = await createAuthorizedPrincipal(store);

    const outcome = await service.sendMessage(principalId, '', 'Hello', 'Hi');

    assert.strictEqual(outcome.status, 'fatal');
    assert.strictEqual(outcome.status === 'fatal' && outcome.error.code, 'INVALID_REQUEST');
  });
});

describe('snippetOf', () => {
  it('should collapse whitespace and cut at 200 characters', () => {
    assert.strictEqual(snippetOf('  a\n\tb  '), 'a b');
    assert.strictEqual(snippetOf('x'.repeat(300)).length, 200);
  });
});
