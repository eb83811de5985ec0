// Gmail API client: outcome classification, retry with backoff, and the MailProvider operations
import { google, gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import {
  MailError,
  MalformedResponseError,
  NotFoundError,
  ProviderRateLimitedError,
  ProviderRejectedError,
  TokenRevokedError,
  TransientNetworkError,
} from '../../shared/errors.js';
import { failure, ok } from '../../shared/types/api.js';
import type {
  MailProvider,
  MessageDetail,
  MessagePage,
  OutgoingMessage,
  ProviderOutcome,
  SentMessage,
} from '../../shared/types/api.js';
import { parseMessage } from './message-parser.js';
import { buildRawMessage } from './mime.js';

/**
 * The slice of the Gmail REST API the provider client calls.
 * Every method authenticates with the given access token.
 */
export interface GmailApi {
  listMessages(
    accessToken: string,
    params: { pageToken?: string; maxResults: number; q?: string }
  ): Promise<gmail_v1.Schema$ListMessagesResponse>;
  getMessage(
    accessToken: string,
    id: string,
    format: 'full' | 'minimal'
  ): Promise<gmail_v1.Schema$Message>;
  sendRaw(accessToken: string, raw: string): Promise<gmail_v1.Schema$Message>;
  modifyLabels(
    accessToken: string,
    id: string,
    addLabelIds: string[],
    removeLabelIds: string[]
  ): Promise<gmail_v1.Schema$Message>;
}

/**
 * GmailApi backed by googleapis. A fresh OAuth2Client is built per call so that
 * no token is shared between principals.
 */
export function googleGmailApi(createAuthClient: () => OAuth2Client): GmailApi {
  const gmailFor = (accessToken: string): gmail_v1.Gmail => {
    const auth = createAuthClient();
    auth.setCredentials({ access_token: accessToken });
    return google.gmail({ version: 'v1', auth });
  };

  return {
    async listMessages(accessToken, params) {
      const response = await gmailFor(accessToken).users.messages.list({
        userId: 'me',
        maxResults: params.maxResults,
        pageToken: params.pageToken,
        q: params.q,
      });
      return response.data;
    },

    async getMessage(accessToken, id, format) {
      const response = await gmailFor(accessToken).users.messages.get({
        userId: 'me',
        id,
        format,
      });
      return response.data;
    },

    async sendRaw(accessToken, raw) {
      const response = await gmailFor(accessToken).users.messages.send({
        userId: 'me',
        requestBody: { raw },
      });
      return response.data;
    },

    async modifyLabels(accessToken, id, addLabelIds, removeLabelIds) {
      const response = await gmailFor(accessToken).users.messages.modify({
        userId: 'me',
        id,
        requestBody: { addLabelIds, removeLabelIds },
      });
      return response.data;
    },
  };
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

const SOCKET_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
]);

const RATE_LIMIT_REASONS = new Set([
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
]);

// Shape of errors thrown by gaxios (googleapis' HTTP layer)
const HttpErrorSchema = z.object({
  message: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  response: z
    .object({
      status: z.number(),
      headers: z.unknown().optional(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const GoogleErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    status: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (typeof headers === 'object' && headers !== null) {
    for (const [key, value] of Object.entries(headers)) {
      if (key.toLowerCase() === name && typeof value === 'string') return value;
    }
  }
  return undefined;
}

/**
 * Retry-After as milliseconds: either delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;

  if (/^\d+$/.test(value.trim())) {
    return parseInt(value, 10) * 1000;
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function errorReasons(data: unknown): string[] {
  const parsed = GoogleErrorBodySchema.safeParse(data);
  if (!parsed.success) return [];
  return (parsed.data.error.errors ?? []).flatMap((e) => (e.reason ? [e.reason] : []));
}

/**
 * Map a thrown googleapis error onto the mail error taxonomy.
 * Returns null when the value is not an HTTP or socket failure.
 */
export function classifyProviderError(error: unknown): MailError | null {
  if (error instanceof MailError) return error;

  const parsed = HttpErrorSchema.safeParse(error);
  if (!parsed.success) return null;

  const { response, code } = parsed.data;
  const message = parsed.data.message ?? 'Gmail request failed';

  if (!response) {
    if (typeof code === 'string' && SOCKET_ERROR_CODES.has(code)) {
      return new TransientNetworkError(message, { cause: error });
    }
    return null;
  }

  const status = response.status;
  const options = { cause: error, httpStatus: status };

  if (status === 429) {
    return new ProviderRateLimitedError(message, {
      ...options,
      retryAfterMs: parseRetryAfter(readHeader(response.headers, 'retry-after')),
    });
  }
  if (status === 401 || status === 403) {
    if (status === 403 && errorReasons(response.data).some((r) => RATE_LIMIT_REASONS.has(r))) {
      return new ProviderRateLimitedError(message, {
        ...options,
        retryAfterMs: parseRetryAfter(readHeader(response.headers, 'retry-after')),
      });
    }
    return new TokenRevokedError(message, options);
  }
  if (status >= 500) {
    return new TransientNetworkError(message, options);
  }
  if (status === 404) {
    return new NotFoundError(message, options);
  }
  if (status >= 400) {
    return new ProviderRejectedError(message, options);
  }

  return null;
}

function toFailure(error: MailError) {
  return error.retryable ? failure('retryable', error) : failure('fatal', error);
}

// ============================================================================
// RETRY
// ============================================================================

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Repeat an operation while it reports a retryable outcome.
 * Exponential backoff (base, 2x base, 4x base...), stretched to the Retry-After hint.
 */
export async function withRetry<T>(
  operation: () => Promise<ProviderOutcome<T>>,
  options: RetryOptions,
  label = 'Gmail API'
): Promise<ProviderOutcome<T>> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    const outcome = await operation();
    if (outcome.status !== 'retryable' || attempt >= options.maxRetries) {
      return outcome;
    }

    const hint =
      outcome.error instanceof ProviderRateLimitedError ? outcome.error.retryAfterMs ?? 0 : 0;
    const delay = Math.max(options.baseDelayMs * Math.pow(2, attempt), hint);
    console.warn(
      `${label} error (attempt ${attempt + 1}/${options.maxRetries + 1}): ${outcome.error.message}. Retrying in ${delay}ms...`
    );
    await sleep(delay);
  }
}

// ============================================================================
// CLIENT
// ============================================================================

/**
 * Stateless Gmail provider. Holds no tokens; every call receives one.
 */
export class GmailProviderClient implements MailProvider {
  private retry: RetryOptions;

  constructor(
    private api: GmailApi,
    retry: Partial<RetryOptions> = {}
  ) {
    this.retry = {
      maxRetries: retry.maxRetries ?? 3,
      baseDelayMs: retry.baseDelayMs ?? 1000,
      sleep: retry.sleep,
    };
  }

  async listMessageIds(
    token: string,
    pageCursor: string | null,
    pageSize: number,
    query?: string
  ): Promise<ProviderOutcome<MessagePage>> {
    return withRetry(
      () =>
        this.attempt(
          () =>
            this.api.listMessages(token, {
              pageToken: pageCursor ?? undefined,
              maxResults: pageSize,
              q: query,
            }),
          (data) => {
            const ids = (data.messages ?? []).map((m) => {
              if (!m.id) throw new MalformedResponseError('Listed message without id');
              return m.id;
            });
            return { ids, nextPageCursor: data.nextPageToken ?? null };
          }
        ),
      this.retry,
      'Gmail list'
    );
  }

  async fetchMessage(token: string, id: string): Promise<ProviderOutcome<MessageDetail>> {
    return withRetry(
      () => this.attempt(() => this.api.getMessage(token, id, 'full'), parseMessage),
      this.retry,
      `Gmail get ${id}`
    );
  }

  async fetchLabels(token: string, id: string): Promise<ProviderOutcome<string[]>> {
    return withRetry(
      () =>
        this.attempt(
          () => this.api.getMessage(token, id, 'minimal'),
          (data) => {
            if (!data.id) throw new MalformedResponseError(`Message ${id} returned without id`);
            return data.labelIds ?? [];
          }
        ),
      this.retry,
      `Gmail labels ${id}`
    );
  }

  /**
   * Send once. A failed send is never repeated here: the provider may have accepted it.
   */
  async sendMessage(token: string, message: OutgoingMessage): Promise<ProviderOutcome<SentMessage>> {
    return this.attempt(
      () => this.api.sendRaw(token, buildRawMessage(message)),
      (data) => {
        if (!data.id || !data.threadId) {
          throw new MalformedResponseError('Send response is missing id or threadId');
        }
        return { providerId: data.id, threadId: data.threadId };
      }
    );
  }

  async modifyLabels(
    token: string,
    id: string,
    addLabelIds: string[],
    removeLabelIds: string[]
  ): Promise<ProviderOutcome<string[]>> {
    return withRetry(
      () =>
        this.attempt(
          () => this.api.modifyLabels(token, id, addLabelIds, removeLabelIds),
          (data) => data.labelIds ?? []
        ),
      this.retry,
      `Gmail modify ${id}`
    );
  }

  private async attempt<R, T>(
    request: () => Promise<R>,
    map: (raw: R) => T
  ): Promise<ProviderOutcome<T>> {
    try {
      return ok(map(await request()));
    } catch (error) {
      const mailError = classifyProviderError(error);
      if (!mailError) {
        throw error;
      }
      return toFailure(mailError);
    }
  }
}
