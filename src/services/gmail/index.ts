// Gmail service exports
export {
  GmailProviderClient,
  googleGmailApi,
  classifyProviderError,
  withRetry,
  type GmailApi,
} from './client.js';
export {
  createOAuth2Client,
  buildAuthUrl,
  exchangeCodeForTokens,
  getUserEmail,
  GoogleTokenRefresher,
  googleOAuthFlow,
  type OAuthFlow,
} from './auth.js';
export { TokenLifecycleManager, type TokenManagerOptions, type TokenStatus } from './tokens.js';
export { MailboxSyncEngine, type SyncEngineOptions } from './sync.js';
export { SendService } from './send.js';
export { FlagService, labelDelta, type FlagChange, type LabelDelta } from './flags.js';
export { parseMessage, flagsFromLabels } from './message-parser.js';
export { buildRawMessage } from './mime.js';
