import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { eq } from 'drizzle-orm';
import { schema } from '../../src/db/index.js';
import { SQLiteJobQueue } from '../../src/jobs/queue/sqlite.js';
import { createTestStore, type TestStore } from '../helpers/test-fixtures.js';

describe('SQLiteJobQueue', () => {
  let store: TestStore;
  let queue: SQLiteJobQueue;
  let principalId: number;

  beforeEach(async () => {
    store = createTestStore();
    queue = new SQLiteJobQueue(store.handle.db);
    principalId = (await store.principals.upsertByEmail('test@example.com')).id;
  });

  afterEach(() => {
    store.handle.close();
  });

  async function row(id: number) {
    return store.handle.db.query.jobs.findFirst({ where: eq(schema.jobs.id, id) });
  }

  it('should claim jobs in order and only once', async () => {
    const first = await queue.enqueue('sync', principalId, { max_messages: 5 });
    const second = await queue.enqueue('push_flags', principalId, {
      provider_message_id: 'm1',
      add: [],
      remove: ['UNREAD'],
    });

    const claimed = await queue.claim();
    assert.strictEqual(claimed?.id, first);
    assert.strictEqual(claimed?.jobType, 'sync');
    assert.strictEqual(claimed?.status, 'running');
    assert.strictEqual(claimed?.principalId, principalId);
    assert.deepStrictEqual(claimed?.payload, { max_messages: 5 });
    assert.notStrictEqual(claimed?.startedAt, null);

    assert.strictEqual((await queue.claim())?.id, second);
    assert.strictEqual(await queue.claim(), null);
  });

  it('should mark completed jobs', async () => {
    const id = await queue.enqueue('sync', principalId, {});
    await queue.claim();

    await queue.complete(id);

    const stored = await row(id);
    assert.strictEqual(stored?.status, 'completed');
    assert.notStrictEqual(stored?.completedAt, null);
  });

  it('should return retried jobs to the queue with one more attempt', async () => {
    const id = await queue.enqueue('sync', principalId, {});
    await queue.claim();

    await queue.retry(id, 'socket hang up');

    const stored = await row(id);
    assert.strictEqual(stored?.status, 'pending');
    assert.strictEqual(stored?.attempts, 1);
    assert.strictEqual(stored?.errorMessage, 'socket hang up');
    assert.strictEqual((await queue.claim())?.id, id);
  });

  it('should not claim jobs that used up their attempts', async () => {
    const id = await queue.enqueue('sync', principalId, {}, 1);
    await queue.claim();
    await queue.retry(id, 'socket hang up');

    assert.strictEqual(await queue.claim(), null);
  });

  it('should record permanent failures', async () => {
    const id = await queue.enqueue('sync', principalId, {});
    await queue.claim();

    await queue.fail(id, 'token revoked');

    const stored = await row(id);
    assert.strictEqual(stored?.status, 'failed');
    assert.strictEqual(stored?.attempts, 1);
    assert.strictEqual(stored?.errorMessage, 'token revoked');
  });

  it('should report pending and running jobs per principal and type', async () => {
    const id = await queue.enqueue('sync', principalId, {});
    assert.strictEqual(await queue.hasPendingJob(principalId, 'sync'), true);
    assert.strictEqual(await queue.hasPendingJob(principalId, 'push_flags'), false);

    await queue.claim();
    assert.strictEqual(await queue.hasPendingJob(principalId, 'sync'), true);

    await queue.complete(id);
    assert.strictEqual(await queue.hasPendingJob(principalId, 'sync'), false);
  });

  it('should delete finished jobs older than the retention window', async () => {
    const old = await queue.enqueue('sync', principalId, {});
    const recent = await queue.enqueue('sync', principalId, {});
    const waiting = await queue.enqueue('sync', principalId, {});
    await queue.claim();
    await queue.claim();
    await queue.complete(old);
    await queue.fail(recent, 'boom');

    const tenDaysAgo = new Date(Date.now() - 10 * 24 * 3600 * 1000).toISOString();
    await store.handle.db.update(schema.jobs).set({ completedAt: tenDaysAgo }).where(eq(schema.jobs.id, old));

    assert.strictEqual(await queue.cleanup(7), 1);
    assert.strictEqual(await row(old), undefined);
    assert.strictEqual((await row(recent))?.status, 'failed');
    assert.strictEqual((await row(waiting))?.status, 'pending');
  });

  it('should hand out unreadable payloads as undefined', async () => {
    const id = await queue.enqueue('sync', principalId, {});
    await store.handle.db.update(schema.jobs).set({ payload: 'not json' }).where(eq(schema.jobs.id, id));

    const claimed = await queue.claim();
    assert.strictEqual(claimed?.payload, undefined);
  });
});
