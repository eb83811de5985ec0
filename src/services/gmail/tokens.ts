// Per-principal access token lifecycle: cached hand-out, single-flight refresh, demotion
import { SingleFlight } from '../../lib/single-flight.js';
import { MailError, NeedsReauthError } from '../../shared/errors.js';
import { failure, ok } from '../../shared/types/api.js';
import type {
  Credential,
  CredentialRepository,
  CredentialState,
  ProviderOutcome,
  TokenGrant,
  TokenOutcome,
  TokenRefresher,
} from '../../shared/types/api.js';

export interface TokenManagerOptions {
  /** A token is handed out only while now + skew is before its expiry */
  expirySkewSeconds?: number;
  /** How long a REFRESHING lease is honoured before another process may take it over */
  refreshLeaseMs?: number;
  /** Poll interval while another process holds the lease */
  refreshPollMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface TokenStatus {
  principalId: number;
  status: Credential['status'] | 'MISSING';
  expiresAt: Date | null;
  fresh: boolean;
  hasRefreshToken: boolean;
  scope: string | null;
}

function stateOf(credential: Credential): CredentialState {
  return {
    accessToken: credential.accessToken,
    refreshToken: credential.refreshToken,
    expiresAt: credential.expiresAt,
    status: credential.status,
    refreshStartedAt: credential.refreshStartedAt,
    scope: credential.scope,
  };
}

function needsReauth(principalId: number, reason: string, cause?: MailError) {
  return failure(
    'needs_reauth',
    new NeedsReauthError(`Principal ${principalId} must re-authorize: ${reason}`, { cause })
  );
}

/**
 * Hands out valid access tokens and is the only writer of credential state.
 *
 * In-process callers for one principal share a single refresh promise. Across
 * processes the refresher first moves the credential ACTIVE(v) -> REFRESHING(v+1)
 * by compare-and-swap; everyone else polls until that lease resolves or expires.
 */
export class TokenLifecycleManager {
  private flights = new SingleFlight<number, TokenOutcome>();
  private skewMs: number;
  private leaseMs: number;
  private pollMs: number;
  private now: () => Date;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private credentials: CredentialRepository,
    private refresher: TokenRefresher,
    options: TokenManagerOptions = {}
  ) {
    this.skewMs = (options.expirySkewSeconds ?? 300) * 1000;
    this.leaseMs = options.refreshLeaseMs ?? 30_000;
    this.pollMs = options.refreshPollMs ?? 250;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async getValidToken(principalId: number): Promise<TokenOutcome> {
    const credential = await this.credentials.get(principalId);
    if (!credential) {
      return needsReauth(principalId, 'no credential on record');
    }
    if (credential.status === 'NEEDS_REAUTH') {
      return needsReauth(principalId, 'credential was demoted');
    }
    if (credential.status === 'ACTIVE' && this.isFresh(credential)) {
      return ok({ token: credential.accessToken, expiresAt: credential.expiresAt });
    }

    return this.flights.run(principalId, () => this.refresh(principalId));
  }

  /**
   * Persist tokens from a fresh authorization. This is the only way out of NEEDS_REAUTH.
   * A grant without a refresh token keeps the one already stored.
   */
  async storeGrant(principalId: number, grant: TokenGrant): Promise<Credential> {
    const existing = await this.credentials.get(principalId);

    const credential = await this.credentials.saveGrant(principalId, {
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken ?? existing?.refreshToken ?? null,
      expiresAt: grant.expiresAt,
      status: 'ACTIVE',
      refreshStartedAt: null,
      scope: grant.scope ?? existing?.scope ?? null,
    });

    if (!credential.refreshToken) {
      console.warn(`[TokenManager] Principal ${principalId} has no refresh token; re-consent will be needed at expiry`);
    }
    console.log(`[TokenManager] ✓ Stored grant for principal ${principalId}`);
    return credential;
  }

  /**
   * The provider rejected `accessToken` as revoked. Demote the credential unless it has
   * been replaced in the meantime.
   */
  async reportRevoked(principalId: number, accessToken: string): Promise<void> {
    const current = await this.credentials.get(principalId);
    if (!current || current.status === 'NEEDS_REAUTH' || current.accessToken !== accessToken) {
      return;
    }

    const demoted = await this.credentials.compareAndSwap(principalId, current.version, {
      ...stateOf(current),
      status: 'NEEDS_REAUTH',
      refreshStartedAt: null,
    });
    if (demoted) {
      console.warn(`[TokenManager] Principal ${principalId} access was revoked, re-authorization required`);
    }
  }

  /**
   * Diagnostic view of a credential. Never includes the tokens.
   */
  async inspect(principalId: number): Promise<TokenStatus> {
    const credential = await this.credentials.get(principalId);
    if (!credential) {
      return {
        principalId,
        status: 'MISSING',
        expiresAt: null,
        fresh: false,
        hasRefreshToken: false,
        scope: null,
      };
    }

    return {
      principalId,
      status: credential.status,
      expiresAt: credential.expiresAt,
      fresh: credential.status === 'ACTIVE' && this.isFresh(credential),
      hasRefreshToken: credential.refreshToken !== null,
      scope: credential.scope,
    };
  }

  private isFresh(credential: Credential): boolean {
    return this.now().getTime() + this.skewMs < credential.expiresAt.getTime();
  }

  private leaseExpired(credential: Credential): boolean {
    if (!credential.refreshStartedAt) return true;
    return this.now().getTime() - credential.refreshStartedAt.getTime() >= this.leaseMs;
  }

  private async refresh(principalId: number): Promise<TokenOutcome> {
    for (;;) {
      const current = await this.credentials.get(principalId);
      if (!current) {
        return needsReauth(principalId, 'no credential on record');
      }

      switch (current.status) {
        case 'NEEDS_REAUTH':
          return needsReauth(principalId, 'credential was demoted');

        case 'ACTIVE':
          // Another process may have finished a refresh since the caller looked
          if (this.isFresh(current)) {
            return ok({ token: current.accessToken, expiresAt: current.expiresAt });
          }
          break;

        case 'REFRESHING':
          if (!this.leaseExpired(current)) {
            await this.sleep(this.pollMs);
            continue;
          }
          console.warn(`[TokenManager] Taking over expired refresh lease for principal ${principalId}`);
          break;
      }

      if (!current.refreshToken) {
        await this.credentials.compareAndSwap(principalId, current.version, {
          ...stateOf(current),
          status: 'NEEDS_REAUTH',
          refreshStartedAt: null,
        });
        return needsReauth(principalId, 'no refresh token available');
      }

      const claimed = await this.credentials.compareAndSwap(principalId, current.version, {
        ...stateOf(current),
        status: 'REFRESHING',
        refreshStartedAt: this.now(),
      });
      if (!claimed) {
        continue;
      }

      return this.refreshUnderLease(principalId, current.version + 1, current, current.refreshToken);
    }
  }

  private async refreshUnderLease(
    principalId: number,
    leaseVersion: number,
    snapshot: Credential,
    refreshToken: string
  ): Promise<TokenOutcome> {
    const settled: CredentialState = { ...stateOf(snapshot), status: 'ACTIVE', refreshStartedAt: null };

    let outcome: ProviderOutcome<TokenGrant>;
    try {
      outcome = await this.refresher.refresh(refreshToken);
    } catch (error) {
      await this.credentials.compareAndSwap(principalId, leaseVersion, settled);
      throw error;
    }

    switch (outcome.status) {
      case 'ok': {
        const grant = outcome.value;
        const swapped = await this.credentials.compareAndSwap(principalId, leaseVersion, {
          accessToken: grant.accessToken,
          refreshToken: grant.refreshToken ?? refreshToken,
          expiresAt: grant.expiresAt,
          status: 'ACTIVE',
          refreshStartedAt: null,
          scope: grant.scope ?? snapshot.scope,
        });
        if (swapped) {
          console.log(`[TokenManager] ✓ Token refreshed for principal ${principalId}`);
        } else {
          console.warn(`[TokenManager] Refresh lease for principal ${principalId} was lost; new token not stored`);
        }
        return ok({ token: grant.accessToken, expiresAt: grant.expiresAt });
      }

      case 'retryable':
        await this.credentials.compareAndSwap(principalId, leaseVersion, settled);
        console.warn(`[TokenManager] Refresh for principal ${principalId} failed, will retry later: ${outcome.error.message}`);
        return outcome;

      case 'fatal':
        await this.credentials.compareAndSwap(principalId, leaseVersion, {
          ...settled,
          status: 'NEEDS_REAUTH',
        });
        console.error(`[TokenManager] Refresh for principal ${principalId} rejected (${outcome.error.code}), re-authorization required`);
        return needsReauth(principalId, outcome.error.message, outcome.error);
    }
  }
}
