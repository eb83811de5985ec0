import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { Credentials } from 'google-auth-library';
import {
  GoogleTokenRefresher,
  buildAuthUrl,
  createOAuth2Client,
  type RefreshingClient,
} from '../../../src/services/gmail/auth.js';
import { InvalidGrantError } from '../../../src/shared/errors.js';
import { httpError, socketError } from '../../helpers/mock-clients.js';
import { NOW, testConfig } from '../../helpers/test-fixtures.js';

class FakeRefreshingClient implements RefreshingClient {
  credentials: Credentials = {};

  constructor(private reply: () => Promise<{ credentials: Credentials }>) {}

  setCredentials(credentials: Credentials): void {
    this.credentials = credentials;
  }

  refreshAccessToken(): Promise<{ credentials: Credentials }> {
    return this.reply();
  }
}

function refresherWith(reply: () => Promise<{ credentials: Credentials }>) {
  const clients: FakeRefreshingClient[] = [];
  const refresher = new GoogleTokenRefresher(() => {
    const client = new FakeRefreshingClient(reply);
    clients.push(client);
    return client;
  }, () => NOW.getTime());
  return { refresher, clients };
}

describe('GoogleTokenRefresher', () => {
  it('should return the refreshed grant', async () => {
    const expiry = NOW.getTime() + 3600 * 1000;
    const { refresher, clients } = refresherWith(async () => ({
      credentials: {
        access_token: 'access-new',
        expiry_date: expiry,
        scope: 'https://www.googleapis.com/auth/gmail.modify',
      },
    }));

    const outcome = await refresher.refresh('refresh-initial');

    assert.deepStrictEqual(outcome, {
      status: 'ok',
      value: {
        accessToken: 'access-new',
        refreshToken: null,
        expiresAt: new Date(expiry),
        scope: 'https://www.googleapis.com/auth/gmail.modify',
      },
    });
    assert.deepStrictEqual(clients[0].credentials, { refresh_token: 'refresh-initial' });
  });

  it('should assume an hour when no expiry is given', async () => {
    const { refresher } = refresherWith(async () => ({
      credentials: { access_token: 'access-new', refresh_token: 'refresh-rotated' },
    }));

    const outcome = await refresher.refresh('refresh-initial');

    assert.strictEqual(outcome.status, 'ok');
    if (outcome.status === 'ok') {
      assert.strictEqual(outcome.value.expiresAt.toISOString(), '2026-03-02T11:00:00.000Z');
      assert.strictEqual(outcome.value.refreshToken, 'refresh-rotated');
    }
  });

  it('should treat invalid_grant as permanent', async () => {
    const { refresher } = refresherWith(async () => {
      throw httpError(400, { error: 'invalid_grant', error_description: 'Token has been expired or revoked.' });
    });

    const outcome = await refresher.refresh('refresh-initial');

    assert.strictEqual(outcome.status, 'fatal');
    if (outcome.status === 'fatal') {
      assert.ok(outcome.error instanceof InvalidGrantError);
      assert.strictEqual(outcome.error.message, 'Token has been expired or revoked.');
    }
  });

  it('should keep a refused OAuth client retryable', async () => {
    const { refresher } = refresherWith(async () => {
      throw httpError(401, { error: 'invalid_client', error_description: 'The OAuth client was not found.' });
    });

    const outcome = await refresher.refresh('refresh-initial');

    assert.strictEqual(outcome.status, 'retryable');
    if (outcome.status === 'retryable') {
      assert.strictEqual(outcome.error.code, 'CLIENT_MISCONFIGURED');
      assert.strictEqual(
        outcome.error.message,
        'OAuth client refused (invalid_client): The OAuth client was not found.'
      );
    }
  });

  it('should treat other OAuth request errors as rejected', async () => {
    const { refresher } = refresherWith(async () => {
      throw httpError(400, { error: 'invalid_scope' });
    });

    const outcome = await refresher.refresh('refresh-initial');

    assert.strictEqual(outcome.status, 'fatal');
    assert.strictEqual(outcome.status === 'fatal' && outcome.error.code, 'PROVIDER_REJECTED');
  });

  it('should keep server and socket failures retryable', async () => {
    const server = refresherWith(async () => {
      throw httpError(503, { error: 'backend_error' });
    });
    const socket = refresherWith(async () => {
      throw socketError('ECONNRESET');
    });

    const fromServer = await server.refresher.refresh('refresh-initial');
    const fromSocket = await socket.refresher.refresh('refresh-initial');

    assert.strictEqual(fromServer.status, 'retryable');
    assert.strictEqual(fromServer.status === 'retryable' && fromServer.error.code, 'TRANSIENT_NETWORK');
    assert.strictEqual(fromSocket.status, 'retryable');
  });

  it('should report a grant without access token as malformed', async () => {
    const { refresher } = refresherWith(async () => ({ credentials: {} }));

    const outcome = await refresher.refresh('refresh-initial');

    assert.strictEqual(outcome.status, 'fatal');
    assert.strictEqual(outcome.status === 'fatal' && outcome.error.code, 'MALFORMED_RESPONSE');
  });

  it('should rethrow errors it cannot classify', async () => {
    const { refresher } = refresherWith(async () => {
      throw new Error('unexpected');
    });

    await assert.rejects(refresher.refresh('refresh-initial'), /unexpected/);
  });
});

describe('buildAuthUrl', () => {
  it('should ask for offline access with a consent prompt', () => {
    const google = testConfig({ google: { clientId: 'test-client', clientSecret: 'test-secret' } }).google;
    const url = new URL(buildAuthUrl(createOAuth2Client(google), google.scopes, 'state-1'));

    assert.strictEqual(url.searchParams.get('access_type'), 'offline');
    assert.strictEqual(url.searchParams.get('prompt'), 'consent');
    assert.strictEqual(url.searchParams.get('client_id'), 'test-client');
    assert.strictEqual(url.searchParams.get('state'), 'state-1');
    assert.strictEqual(url.searchParams.get('redirect_uri'), google.redirectUri);
    assert.strictEqual(url.searchParams.get('scope'), google.scopes.join(' '));
  });
});

describe('createOAuth2Client', () => {
  it('should refuse to build a client without credentials', () => {
    assert.throws(() => createOAuth2Client(testConfig().google), /not configured/);
  });
});
