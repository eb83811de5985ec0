import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { SQLiteJobQueue } from '../src/jobs/queue/sqlite.js';
import { Scheduler } from '../src/scheduler/index.js';
import {
  createAuthorizedPrincipal,
  createTestStore,
  testConfig,
  type TestStore,
} from './helpers/test-fixtures.js';

describe('Scheduler', () => {
  let store: TestStore;
  let queue: SQLiteJobQueue;
  let scheduler: Scheduler;

  beforeEach(() => {
    store = createTestStore();
    queue = new SQLiteJobQueue(store.handle.db);
    scheduler = new Scheduler(queue, store.principals, testConfig().scheduler);
  });

  afterEach(async () => {
    await scheduler.stop();
    store.handle.close();
  });

  it('should enqueue a sync per syncable principal', async () => {
    const { principalId: first } = await createAuthorizedPrincipal(store, { email: 'a@example.com' });
    const { principalId: second } = await createAuthorizedPrincipal(store, { email: 'b@example.com' });
    await createAuthorizedPrincipal(store, {
      email: 'c@example.com',
      credential: { status: 'NEEDS_REAUTH' },
    });

    assert.strictEqual(await scheduler.periodicSync(), 2);
    assert.strictEqual(await queue.hasPendingJob(first, 'sync'), true);
    assert.strictEqual(await queue.hasPendingJob(second, 'sync'), true);
  });

  it('should not queue a second sync while one is pending', async () => {
    await createAuthorizedPrincipal(store);

    assert.strictEqual(await scheduler.periodicSync(), 1);
    assert.strictEqual(await scheduler.periodicSync(), 0);
  });

  it('should report zero when the store is unavailable', async () => {
    store.handle.close();

    assert.strictEqual(await scheduler.periodicSync(), 0);
    assert.strictEqual(await scheduler.cleanupJobs(), 0);
  });

  it('should clean up finished jobs', async () => {
    assert.strictEqual(await scheduler.cleanupJobs(), 0);
  });

  it('should start and stop its timers', async () => {
    await scheduler.start();
    await scheduler.stop();
    await scheduler.stop();
  });
});
