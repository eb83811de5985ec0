// Application wiring: one explicitly constructed graph of database, repositories and services
import { google } from "googleapis";
import type { Config } from "./config/index.js";
import { openDatabase, type DatabaseHandle } from "./db/index.js";
import {
  SqliteCredentialRepository,
  SqliteMessageRepository,
  SqlitePrincipalRepository,
} from "./db/repositories/index.js";
import { createTokenCipher, plainTokenCipher } from "./lib/encryption.js";
import { createJobQueue, type JobQueue } from "./jobs/queue/index.js";
import {
  createOAuth2Client,
  FlagService,
  GmailProviderClient,
  googleGmailApi,
  googleOAuthFlow,
  GoogleTokenRefresher,
  MailboxSyncEngine,
  SendService,
  TokenLifecycleManager,
  type GmailApi,
  type OAuthFlow,
  type TokenManagerOptions,
} from "./services/gmail/index.js";
import type {
  Classifier,
  MailProvider,
  TokenRefresher,
} from "./shared/types/api.js";

export interface AppContext {
  config: Config;
  database: DatabaseHandle;
  principals: SqlitePrincipalRepository;
  credentials: SqliteCredentialRepository;
  messages: SqliteMessageRepository;
  tokens: TokenLifecycleManager;
  provider: MailProvider;
  syncEngine: MailboxSyncEngine;
  sendService: SendService;
  flags: FlagService;
  queue: JobQueue;
  oauth: OAuthFlow;
  close(): Promise<void>;
}

/** Collaborators that replace the Google-backed defaults, mostly in tests */
export interface AppOverrides {
  gmailApi?: GmailApi;
  refresher?: TokenRefresher;
  oauth?: OAuthFlow;
  classifier?: Classifier;
  queue?: JobQueue;
  tokenOptions?: Pick<TokenManagerOptions, "now" | "sleep">;
  retrySleep?: (ms: number) => Promise<void>;
}

export function createAppContext(config: Config, overrides: AppOverrides = {}): AppContext {
  const database = openDatabase(config.database.url);
  const cipher = config.security.tokenEncryptionKey
    ? createTokenCipher(config.security.tokenEncryptionKey)
    : plainTokenCipher;

  const principals = new SqlitePrincipalRepository(database.db);
  const credentials = new SqliteCredentialRepository(database.db, cipher);
  const messages = new SqliteMessageRepository(database.db);

  const refresher =
    overrides.refresher ?? new GoogleTokenRefresher(() => createOAuth2Client(config.google));
  const tokens = new TokenLifecycleManager(credentials, refresher, {
    expirySkewSeconds: config.tokens.expirySkewSeconds,
    refreshLeaseMs: config.tokens.refreshLeaseMs,
    refreshPollMs: config.tokens.refreshPollMs,
    ...overrides.tokenOptions,
  });

  // Bearer-only client: the access token is all the Gmail API needs
  const gmailApi = overrides.gmailApi ?? googleGmailApi(() => new google.auth.OAuth2());
  const provider = new GmailProviderClient(gmailApi, {
    maxRetries: config.gmail.maxRetries,
    baseDelayMs: config.gmail.baseDelayMs,
    sleep: overrides.retrySleep,
  });

  const syncEngine = new MailboxSyncEngine(tokens, provider, messages, {
    pageSize: config.sync.pageSize,
    maxMessages: config.sync.maxMessages,
    maxPages: config.sync.maxPages,
    query: config.sync.query,
    reconcileFlags: config.sync.reconcileFlags,
    classifier: overrides.classifier,
  });

  const queue = overrides.queue ?? createJobQueue(config.queue, database.db);

  return {
    config,
    database,
    principals,
    credentials,
    messages,
    tokens,
    provider,
    syncEngine,
    sendService: new SendService(tokens, provider, principals, messages),
    flags: new FlagService(tokens, provider, messages),
    queue,
    oauth: overrides.oauth ?? googleOAuthFlow(config.google),
    async close() {
      await queue.close();
      database.close();
    },
  };
}
