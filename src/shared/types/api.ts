/**
 * Shared contracts
 * Records, outcome types and the repository/provider interfaces the mailbox core is built against
 */

import type { MailError } from '../errors.js';

// ============================================================================
// OUTCOMES
// ============================================================================

export interface Ok<T> {
  status: 'ok';
  value: T;
}

export interface Failure<S extends 'retryable' | 'fatal' | 'needs_reauth'> {
  status: S;
  error: MailError;
}

/** Result of one remote provider operation */
export type ProviderOutcome<T> = Ok<T> | Failure<'retryable'> | Failure<'fatal'>;

export type TokenOutcome = Ok<AccessToken> | Failure<'retryable'> | Failure<'needs_reauth'>;

export type SendOutcome =
  | Ok<MessageRecord>
  | Failure<'retryable'>
  | Failure<'fatal'>
  | Failure<'needs_reauth'>;

export function ok<T>(value: T): Ok<T> {
  return { status: 'ok', value };
}

export function failure<S extends 'retryable' | 'fatal' | 'needs_reauth'>(
  status: S,
  error: MailError
): Failure<S> {
  return { status, error };
}

// ============================================================================
// PRINCIPALS & CREDENTIALS
// ============================================================================

export interface Principal {
  id: number;
  email: string;
  displayName: string | null;
  isActive: boolean;
}

export type CredentialStatus = 'ACTIVE' | 'REFRESHING' | 'NEEDS_REAUTH';

export interface Credential {
  principalId: number;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date;
  status: CredentialStatus;
  /** Optimistic concurrency counter, bumped by every successful compare-and-swap */
  version: number;
  /** When the current REFRESHING lease was taken */
  refreshStartedAt: Date | null;
  scope: string | null;
}

/** Mutable part of a credential written through compare-and-swap */
export type CredentialState = Omit<Credential, 'principalId' | 'version'>;

export interface AccessToken {
  token: string;
  expiresAt: Date;
}

/** Tokens handed out by the provider, either from an authorization code or a refresh */
export interface TokenGrant {
  accessToken: string;
  refreshToken?: string | null;
  expiresAt: Date;
  scope?: string | null;
}

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<ProviderOutcome<TokenGrant>>;
}

export interface CredentialRepository {
  get(principalId: number): Promise<Credential | null>;
  /** Writes `next` only if the stored version still equals `expectedVersion` */
  compareAndSwap(principalId: number, expectedVersion: number, next: CredentialState): Promise<boolean>;
  /** Unconditional write used by a fresh authorization grant */
  saveGrant(principalId: number, state: CredentialState): Promise<Credential>;
}

export interface PrincipalRepository {
  get(principalId: number): Promise<Principal | null>;
  findByEmail(email: string): Promise<Principal | null>;
  upsertByEmail(email: string, displayName?: string | null): Promise<Principal>;
  /** Active principals whose credential is not waiting for re-authorization */
  listSyncable(): Promise<Principal[]>;
}

// ============================================================================
// MESSAGES & CURSORS
// ============================================================================

export type MessageFolder = 'inbox' | 'archive' | 'sent' | 'drafts' | 'spam' | 'trash';

export type MessageDirection = 'inbound' | 'outbound';

export interface MessageFlags {
  isRead: boolean;
  isStarred: boolean;
  folder: MessageFolder;
  labels: string[];
}

export interface MessageRecord extends MessageFlags {
  principalId: number;
  providerMessageId: string;
  threadId: string;
  subject: string;
  sender: string;
  recipients: string;
  snippet: string;
  body: string;
  receivedAt: Date;
  direction: MessageDirection;
  category: string | null;
  summary: string | null;
  sentiment: string | null;
  ingestedAt: Date;
}

/**
 * Older part of the listing a run could not reach. The next run resumes listing at
 * `pageCursor` (null is the top) and stops at `stopAtId` (null is the end of the listing).
 */
export interface BackfillRange {
  pageCursor: string | null;
  stopAtId: string | null;
}

export interface SyncCursor {
  principalId: number;
  /** Newest provider id mirrored; everything older is either mirrored or covered by `backfill` */
  headMessageId: string | null;
  /** Last provider id, in listing order, up to which every listed message is persisted */
  lastMessageId: string | null;
  /** Ranges still to walk, newest first */
  backfill: BackfillRange[];
  updatedAt: Date;
}

export interface MessageFilter {
  folder?: MessageFolder;
  isRead?: boolean;
  isStarred?: boolean;
  limit: number;
  offset: number;
}

export interface MessageListing {
  messages: MessageRecord[];
  /** Matches before paging */
  total: number;
}

export interface MailboxStats {
  total: number;
  unread: number;
  starred: number;
  folders: Record<MessageFolder, number>;
}

export interface MessageRepository {
  existsByProviderId(principalId: number, providerMessageId: string): Promise<boolean>;
  findByProviderId(principalId: number, providerMessageId: string): Promise<MessageRecord | null>;
  /** Inserts the record, or refreshes the flags of an existing one; never duplicates */
  upsert(message: MessageRecord): Promise<{ created: boolean }>;
  updateFlags(principalId: number, providerMessageId: string, flags: MessageFlags): Promise<boolean>;
  /** Newest first */
  list(principalId: number, filter: MessageFilter): Promise<MessageListing>;
  stats(principalId: number): Promise<MailboxStats>;
  getCursor(principalId: number): Promise<SyncCursor | null>;
  setCursor(cursor: SyncCursor): Promise<void>;
}

// ============================================================================
// PROVIDER
// ============================================================================

export interface MessagePage {
  ids: string[];
  nextPageCursor: string | null;
}

export interface MessageDetail {
  providerMessageId: string;
  threadId: string;
  subject: string;
  sender: string;
  recipients: string;
  snippet: string;
  body: string;
  /** Parsed Date header, null when it is missing or unparseable */
  sentAt: Date | null;
  labels: string[];
}

export interface OutgoingMessage {
  from?: string;
  to: string;
  subject: string;
  body: string;
}

export interface SentMessage {
  providerId: string;
  threadId: string;
}

/**
 * Mail provider operations the core needs.
 * Implementations: src/services/gmail/client.ts
 */
export interface MailProvider {
  listMessageIds(
    token: string,
    pageCursor: string | null,
    pageSize: number,
    query?: string
  ): Promise<ProviderOutcome<MessagePage>>;
  fetchMessage(token: string, id: string): Promise<ProviderOutcome<MessageDetail>>;
  fetchLabels(token: string, id: string): Promise<ProviderOutcome<string[]>>;
  sendMessage(token: string, message: OutgoingMessage): Promise<ProviderOutcome<SentMessage>>;
  modifyLabels(
    token: string,
    id: string,
    addLabelIds: string[],
    removeLabelIds: string[]
  ): Promise<ProviderOutcome<string[]>>;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export interface Classification {
  category: string;
  summary: string;
  sentiment: string;
}

/** Pure text classifier supplied by the AI collaborator */
export type Classifier = (text: string) => Classification;

// ============================================================================
// SYNC
// ============================================================================

export interface SyncOptions {
  maxMessages?: number;
  signal?: AbortSignal;
  reconcileFlags?: boolean;
}

export interface SyncError {
  providerMessageId: string | null;
  code: MailError['code'];
  message: string;
  retryable: boolean;
}

export interface SyncResult {
  fetched: number;
  ingested: number;
  reconciled: number;
  errors: SyncError[];
  reauthRequired: boolean;
  aborted: boolean;
  cancelled: boolean;
  cursor: SyncCursor | null;
}
