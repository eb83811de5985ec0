import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { eq } from 'drizzle-orm';
import { schema } from '../../src/db/index.js';
import { SqliteCredentialRepository } from '../../src/db/repositories/index.js';
import { createTokenCipher } from '../../src/lib/encryption.js';
import { RepositoryUnavailableError } from '../../src/shared/errors.js';
import {
  NOW,
  createAuthorizedPrincipal,
  createTestStore,
  messageRecord,
  type TestStore,
} from '../helpers/test-fixtures.js';

describe('SqlitePrincipalRepository', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.handle.close();
  });

  it('should create a principal once per email', async () => {
    const first = await store.principals.upsertByEmail('alice@example.com', 'Alice');
    const second = await store.principals.upsertByEmail('alice@example.com');

    assert.strictEqual(second.id, first.id);
    assert.strictEqual(second.displayName, 'Alice');
    assert.strictEqual(second.isActive, true);
  });

  it('should find principals by id and email', async () => {
    const created = await store.principals.upsertByEmail('bob@example.com');

    assert.deepStrictEqual(await store.principals.get(created.id), created);
    assert.deepStrictEqual(await store.principals.findByEmail('bob@example.com'), created);
    assert.strictEqual(await store.principals.findByEmail('nobody@example.com'), null);
  });

  it('should list only active principals with a usable credential', async () => {
    const { principalId: ready } = await createAuthorizedPrincipal(store, { email: 'ready@example.com' });
    await createAuthorizedPrincipal(store, {
      email: 'demoted@example.com',
      credential: { status: 'NEEDS_REAUTH' },
    });
    const { principalId: inactive } = await createAuthorizedPrincipal(store, { email: 'inactive@example.com' });
    await store.principals.upsertByEmail('no-credential@example.com');

    await store.handle.db
      .update(schema.principals)
      .set({ isActive: false })
      .where(eq(schema.principals.id, inactive));

    const syncable = await store.principals.listSyncable();
    assert.deepStrictEqual(
      syncable.map((p) => p.id),
      [ready]
    );
  });
});

describe('SqliteCredentialRepository', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.handle.close();
  });

  it('should start at version 0 and bump it on every new grant', async () => {
    const { principalId, credential } = await createAuthorizedPrincipal(store);
    assert.strictEqual(credential.version, 0);

    const regranted = await store.credentials.saveGrant(principalId, {
      accessToken: 'access-second',
      refreshToken: 'refresh-second',
      expiresAt: NOW,
      status: 'ACTIVE',
      refreshStartedAt: null,
      scope: null,
    });

    assert.strictEqual(regranted.version, 1);
    assert.strictEqual(regranted.accessToken, 'access-second');
  });

  it('should compare-and-swap only against the current version', async () => {
    const { principalId, credential } = await createAuthorizedPrincipal(store);
    const next = {
      accessToken: credential.accessToken,
      refreshToken: credential.refreshToken,
      expiresAt: credential.expiresAt,
      status: 'REFRESHING' as const,
      refreshStartedAt: NOW,
      scope: credential.scope,
    };

    assert.strictEqual(await store.credentials.compareAndSwap(principalId, 0, next), true);
    assert.strictEqual(await store.credentials.compareAndSwap(principalId, 0, next), false);

    const stored = await store.credentials.get(principalId);
    assert.strictEqual(stored?.version, 1);
    assert.strictEqual(stored?.status, 'REFRESHING');
    assert.strictEqual(stored?.refreshStartedAt?.toISOString(), NOW.toISOString());
  });

  it('should keep tokens sealed at rest when a cipher is configured', async () => {
    const sealed = new SqliteCredentialRepository(
      store.handle.db,
      createTokenCipher('0123456789abcdef'.repeat(4))
    );
    const { principalId } = await createAuthorizedPrincipal({ principals: store.principals, credentials: sealed });

    const row = await store.handle.db.query.credentials.findFirst({
      where: eq(schema.credentials.principalId, principalId),
    });
    assert.ok(row?.accessToken.startsWith('v1:'));
    assert.ok(row?.refreshToken?.startsWith('v1:'));

    const credential = await sealed.get(principalId);
    assert.strictEqual(credential?.accessToken, 'access-initial');
    assert.strictEqual(credential?.refreshToken, 'refresh-initial');
  });

  it('should return null for a principal without credentials', async () => {
    assert.strictEqual(await store.credentials.get(999), null);
  });

  it('should report a closed database as unavailable', async () => {
    store.handle.close();
    await assert.rejects(store.credentials.get(1), RepositoryUnavailableError);
  });
});

describe('SqliteMessageRepository', () => {
  let store: TestStore;
  let principalId: number;

  beforeEach(async () => {
    store = createTestStore();
    principalId = (await store.principals.upsertByEmail('test@example.com')).id;
  });

  afterEach(() => {
    store.handle.close();
  });

  it('should insert a message once and refresh flags on repeat', async () => {
    const first = await store.messages.upsert(messageRecord(principalId));
    const second = await store.messages.upsert(
      messageRecord(principalId, { isRead: true, labels: ['INBOX'], subject: 'Changed' })
    );

    assert.deepStrictEqual(first, { created: true });
    assert.deepStrictEqual(second, { created: false });

    const rows = await store.handle.db.select().from(schema.messages);
    assert.strictEqual(rows.length, 1);

    const stored = await store.messages.findByProviderId(principalId, 'm1');
    assert.strictEqual(stored?.isRead, true);
    assert.deepStrictEqual(stored?.labels, ['INBOX']);
    assert.strictEqual(stored?.subject, 'Hello');
  });

  it('should round-trip a message record', async () => {
    const record = messageRecord(principalId, { category: 'billing', summary: 'Invoice', sentiment: 'neutral' });
    await store.messages.upsert(record);

    assert.deepStrictEqual(await store.messages.findByProviderId(principalId, 'm1'), record);
  });

  it('should answer existence per principal', async () => {
    const other = (await store.principals.upsertByEmail('other@example.com')).id;
    await store.messages.upsert(messageRecord(principalId));

    assert.strictEqual(await store.messages.existsByProviderId(principalId, 'm1'), true);
    assert.strictEqual(await store.messages.existsByProviderId(other, 'm1'), false);
  });

  it('should update flags of known messages only', async () => {
    await store.messages.upsert(messageRecord(principalId));
    const flags = { isRead: true, isStarred: true, folder: 'archive' as const, labels: ['STARRED'] };

    assert.strictEqual(await store.messages.updateFlags(principalId, 'm1', flags), true);
    assert.strictEqual(await store.messages.updateFlags(principalId, 'unknown', flags), false);

    const stored = await store.messages.findByProviderId(principalId, 'm1');
    assert.strictEqual(stored?.folder, 'archive');
    assert.strictEqual(stored?.isStarred, true);
  });

  describe('list and stats', () => {
    const HOUR = 60 * 60 * 1000;

    beforeEach(async () => {
      await store.messages.upsert(messageRecord(principalId));
      await store.messages.upsert(
        messageRecord(principalId, {
          providerMessageId: 'm2',
          receivedAt: new Date(NOW.getTime() + HOUR),
          isRead: true,
          isStarred: true,
          folder: 'archive',
          labels: ['STARRED'],
        })
      );
      await store.messages.upsert(
        messageRecord(principalId, {
          providerMessageId: 'm3',
          receivedAt: new Date(NOW.getTime() - HOUR),
          isRead: true,
          labels: ['INBOX'],
        })
      );
    });

    it('should list newest first with the total before paging', async () => {
      const listing = await store.messages.list(principalId, { limit: 2, offset: 0 });

      assert.deepStrictEqual(
        listing.messages.map((m) => m.providerMessageId),
        ['m2', 'm1']
      );
      assert.strictEqual(listing.total, 3);
    });

    it('should filter by folder and read state', async () => {
      const unreadInbox = await store.messages.list(principalId, {
        folder: 'inbox',
        isRead: false,
        limit: 10,
        offset: 0,
      });
      const starred = await store.messages.list(principalId, { isStarred: true, limit: 10, offset: 0 });

      assert.deepStrictEqual(unreadInbox.messages.map((m) => m.providerMessageId), ['m1']);
      assert.strictEqual(unreadInbox.total, 1);
      assert.deepStrictEqual(starred.messages.map((m) => m.providerMessageId), ['m2']);
    });

    it('should not list messages of other principals', async () => {
      const other = await store.principals.upsertByEmail('other@example.com');

      const listing = await store.messages.list(other.id, { limit: 10, offset: 0 });

      assert.deepStrictEqual(listing, { messages: [], total: 0 });
    });

    it('should count messages per folder', async () => {
      assert.deepStrictEqual(await store.messages.stats(principalId), {
        total: 3,
        unread: 1,
        starred: 1,
        folders: { inbox: 2, archive: 1, sent: 0, drafts: 0, spam: 0, trash: 0 },
      });
    });
  });

  it('should store and overwrite the sync cursor', async () => {
    assert.strictEqual(await store.messages.getCursor(principalId), null);

    await store.messages.setCursor({
      principalId,
      headMessageId: 'm9',
      lastMessageId: 'm5',
      backfill: [{ pageCursor: '40', stopAtId: null }],
      updatedAt: NOW,
    });
    const later = new Date(NOW.getTime() + 60_000);
    await store.messages.setCursor({
      principalId,
      headMessageId: 'm12',
      lastMessageId: 'm10',
      backfill: [
        { pageCursor: null, stopAtId: 'm9' },
        { pageCursor: '40', stopAtId: null },
      ],
      updatedAt: later,
    });

    assert.deepStrictEqual(await store.messages.getCursor(principalId), {
      principalId,
      headMessageId: 'm12',
      lastMessageId: 'm10',
      backfill: [
        { pageCursor: null, stopAtId: 'm9' },
        { pageCursor: '40', stopAtId: null },
      ],
      updatedAt: later,
    });
  });
});
