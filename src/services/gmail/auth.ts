// Google OAuth 2.0: consent URL, code exchange and access-token refresh
import { google } from 'googleapis';
import type { Credentials, OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import type { Config } from '../../config/index.js';
import {
  ClientMisconfiguredError,
  InvalidGrantError,
  MailError,
  MalformedResponseError,
  ProviderRejectedError,
} from '../../shared/errors.js';
import { failure, ok } from '../../shared/types/api.js';
import type { ProviderOutcome, TokenGrant, TokenRefresher } from '../../shared/types/api.js';
import { classifyProviderError } from './client.js';

const DEFAULT_TOKEN_LIFETIME_MS = 3600 * 1000;

/**
 * Create OAuth2 client from the google config section
 */
export function createOAuth2Client(googleConfig: Config['google']): OAuth2Client {
  if (!googleConfig.clientId || !googleConfig.clientSecret) {
    throw new Error('Google OAuth is not configured: set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET');
  }

  return new google.auth.OAuth2(
    googleConfig.clientId,
    googleConfig.clientSecret,
    googleConfig.redirectUri
  );
}

/**
 * Consent URL. Offline access plus a forced consent prompt so Google issues a refresh token.
 */
export function buildAuthUrl(client: OAuth2Client, scopes: string[], state?: string): string {
  return client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent',
    scope: scopes,
    state,
  });
}

function toGrant(credentials: Credentials, now: number): TokenGrant {
  if (!credentials.access_token) {
    throw new MalformedResponseError('No access token received from Google');
  }

  return {
    accessToken: credentials.access_token,
    refreshToken: credentials.refresh_token ?? null,
    expiresAt: new Date(credentials.expiry_date ?? now + DEFAULT_TOKEN_LIFETIME_MS),
    scope: credentials.scope ?? null,
  };
}

/**
 * Exchange authorization code for tokens
 */
export async function exchangeCodeForTokens(client: OAuth2Client, code: string): Promise<TokenGrant> {
  const { tokens } = await client.getToken(code);
  return toGrant(tokens, Date.now());
}

/**
 * Get the mailbox address for an access token from the Gmail profile API
 */
export async function getUserEmail(client: OAuth2Client, accessToken: string): Promise<string> {
  client.setCredentials({ access_token: accessToken });
  const gmail = google.gmail({ version: 'v1', auth: client });
  const profile = await gmail.users.getProfile({ userId: 'me' });

  if (!profile.data.emailAddress) {
    throw new MalformedResponseError('Failed to get user email from Gmail profile');
  }

  return profile.data.emailAddress;
}

// ============================================================================
// REFRESH
// ============================================================================

/** The part of OAuth2Client used to refresh a token */
export interface RefreshingClient {
  setCredentials(credentials: Credentials): void;
  refreshAccessToken(): Promise<{ credentials: Credentials }>;
}

const OAuthErrorBodySchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

const OAuthHttpErrorSchema = z.object({
  response: z.object({ status: z.number(), data: z.unknown().optional() }),
});

const CLIENT_ERRORS = new Set(['invalid_client', 'unauthorized_client']);

/**
 * Classify a failed refresh. invalid_grant (revoked, expired or rotated-away refresh
 * token) is permanent for the principal. Errors about the OAuth client are the operator's
 * to fix and leave the credential alone. Other OAuth errors are rejected requests;
 * transport and 5xx failures stay retryable.
 */
export function classifyRefreshError(error: unknown): MailError | null {
  const http = OAuthHttpErrorSchema.safeParse(error);
  if (http.success) {
    const body = OAuthErrorBodySchema.safeParse(http.data.response.data);
    if (body.success) {
      const message = body.data.error_description ?? body.data.error;
      const options = { cause: error, httpStatus: http.data.response.status };
      if (body.data.error === 'invalid_grant') {
        return new InvalidGrantError(message, options);
      }
      if (CLIENT_ERRORS.has(body.data.error)) {
        return new ClientMisconfiguredError(`OAuth client refused (${body.data.error}): ${message}`, options);
      }
      if (http.data.response.status < 500) {
        return new ProviderRejectedError(message, options);
      }
    }
  }

  return classifyProviderError(error);
}

/**
 * TokenRefresher over Google's token endpoint
 */
export class GoogleTokenRefresher implements TokenRefresher {
  constructor(
    private createClient: () => RefreshingClient,
    private now: () => number = Date.now
  ) {}

  async refresh(refreshToken: string): Promise<ProviderOutcome<TokenGrant>> {
    const client = this.createClient();
    client.setCredentials({ refresh_token: refreshToken });

    try {
      const { credentials } = await client.refreshAccessToken();
      return ok(toGrant(credentials, this.now()));
    } catch (error) {
      const mailError = classifyRefreshError(error);
      if (!mailError) {
        throw error;
      }
      return mailError.retryable ? failure('retryable', mailError) : failure('fatal', mailError);
    }
  }
}

// ============================================================================
// ONBOARDING
// ============================================================================

/** Authorization-code flow as used by the HTTP onboarding routes */
export interface OAuthFlow {
  authUrl(state?: string): string;
  exchangeCode(code: string): Promise<TokenGrant>;
  mailboxAddress(accessToken: string): Promise<string>;
}

export function googleOAuthFlow(googleConfig: Config['google']): OAuthFlow {
  return {
    authUrl: (state) => buildAuthUrl(createOAuth2Client(googleConfig), googleConfig.scopes, state),
    exchangeCode: (code) => exchangeCodeForTokens(createOAuth2Client(googleConfig), code),
    mailboxAddress: (accessToken) => getUserEmail(createOAuth2Client(googleConfig), accessToken),
  };
}
