import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { createApp } from '../../src/api/app.js';
import { createTestContext, readJson, type TestApp } from '../helpers/app.js';

describe('GET /api/health', () => {
  let testApp: TestApp;

  afterEach(async () => {
    await testApp.ctx.close();
  });

  it('should report a healthy database', async () => {
    testApp = createTestContext();
    const app = createApp(testApp.ctx, { logRequests: false });

    const res = await app.request('/api/health');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await readJson(res), { status: 'ok', database: 'ok', queue: 'sqlite' });
  });

  it('should report a closed database as degraded', async () => {
    testApp = createTestContext();
    const app = createApp(testApp.ctx, { logRequests: false });
    testApp.ctx.database.close();

    const res = await app.request('/api/health');

    assert.strictEqual(res.status, 503);
    assert.deepStrictEqual(await readJson(res), { status: 'degraded', database: 'closed', queue: 'sqlite' });
  });

  it('should stay public when basic auth is configured', async () => {
    testApp = createTestContext({ auth: { basicUser: 'admin', basicPassword: 'test-secret' } });
    const app = createApp(testApp.ctx, { logRequests: false });

    const res = await app.request('/api/health');

    assert.strictEqual(res.status, 200);
  });
});
