// Mailbox sync engine: pages through the provider listing and mirrors unseen messages
import { describeError, type MailError } from '../../shared/errors.js';
import type {
  BackfillRange,
  Classifier,
  MailProvider,
  MessageDetail,
  MessageRecord,
  MessageRepository,
  SyncCursor,
  SyncOptions,
  SyncResult,
} from '../../shared/types/api.js';
import { flagsFromLabels } from './message-parser.js';
import type { TokenLifecycleManager } from './tokens.js';

export interface SyncEngineOptions {
  pageSize?: number;
  maxMessages?: number;
  /** Upper bound on listing pages per run */
  maxPages?: number;
  /** Provider search query, e.g. "in:inbox" */
  query?: string;
  reconcileFlags?: boolean;
  classifier?: Classifier;
  now?: () => Date;
}

type Tokens = Pick<TokenLifecycleManager, 'getValidToken' | 'reportRevoked'>;

function emptyResult(): SyncResult {
  return {
    fetched: 0,
    ingested: 0,
    reconciled: 0,
    errors: [],
    reauthRequired: false,
    aborted: false,
    cancelled: false,
    cursor: null,
  };
}

interface RunLimits {
  maxMessages: number;
  reconcile: boolean;
}

/** Whether a run with limits `running` already does what `wanted` asks for */
function covers(running: RunLimits, wanted: RunLimits): boolean {
  return running.maxMessages >= wanted.maxMessages && (running.reconcile || !wanted.reconcile);
}

/**
 * One run shared by every caller that asked while it was in flight. The run is
 * cancelled only once every caller has aborted.
 */
interface SharedRun {
  limits: RunLimits;
  promise: Promise<SyncResult>;
  controller: AbortController;
  callers: number;
  abandoned: number;
}

/** State of one run across all of its listing walks */
interface RunState {
  principalId: number;
  token: string;
  result: SyncResult;
  signal: AbortSignal;
  limits: RunLimits;
  pagesLeft: number;
}

/**
 * One pass down the listing, newest first, from a page cursor to a stop id.
 *
 * `progressId` trails the last id before which nothing was skipped or failed;
 * `gapPage` is the page holding the first message that failed.
 */
interface Walk {
  stopAt: string | null;
  /** Keep listing past `stopAt` (flag reconciliation) */
  passStop: boolean;
  passedStop: boolean;
  firstListedId: string | null;
  progressId: string | null;
  gapless: boolean;
  gapPage: string | null;
}

type WalkEnd =
  /** Reached the stop id or the end of the listing */
  | { kind: 'reached' }
  /** Ran out of message budget or pages; listing resumes at `resumeAt` */
  | { kind: 'truncated'; resumeAt: string | null }
  /** Aborted or cancelled */
  | { kind: 'stopped' };

function newWalk(stopAt: string | null, passStop = false): Walk {
  return {
    stopAt,
    passStop,
    passedStop: false,
    firstListedId: null,
    progressId: null,
    gapless: true,
    gapPage: null,
  };
}

/**
 * Sync engine
 * token -> list pages -> dedup -> fetch -> normalize -> upsert -> advance cursor
 *
 * A run first walks from the top of the listing down to the previous head. What a
 * run cannot reach (message budget, page cap) is kept on the cursor as backfill
 * ranges that later runs walk once the top is caught up.
 */
export class MailboxSyncEngine {
  private runs = new Map<number, SharedRun>();
  private pageSize: number;
  private maxMessages: number;
  private maxPages: number;
  private now: () => Date;

  constructor(
    private tokens: Tokens,
    private provider: MailProvider,
    private messages: MessageRepository,
    private options: SyncEngineOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 50;
    this.maxMessages = options.maxMessages ?? 200;
    this.maxPages = options.maxPages ?? 20;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Mirror new messages for one principal.
   *
   * A call made while a run for the same principal is in flight joins that run when
   * the run covers what it asked for, and otherwise waits for it and runs again.
   * A caller's signal cancels a shared run only when every caller has aborted.
   */
  async syncPrincipal(principalId: number, options: SyncOptions = {}): Promise<SyncResult> {
    const limits: RunLimits = {
      maxMessages: options.maxMessages ?? this.maxMessages,
      reconcile: options.reconcileFlags ?? this.options.reconcileFlags ?? false,
    };

    const shared = this.runs.get(principalId);
    if (!shared) {
      return this.start(principalId, limits, options.signal).promise;
    }

    if (covers(shared.limits, limits)) {
      this.attach(shared, options.signal);
      return shared.promise;
    }

    await Promise.allSettled([shared.promise]);
    if (options.signal?.aborted) {
      return { ...emptyResult(), cancelled: true };
    }
    return this.syncPrincipal(principalId, options);
  }

  isRunning(principalId: number): boolean {
    return this.runs.has(principalId);
  }

  private start(principalId: number, limits: RunLimits, signal?: AbortSignal): SharedRun {
    const controller = new AbortController();
    // run() starts on the next microtask, after the entry is registered
    const promise = Promise.resolve()
      .then(() => this.run(principalId, limits, controller.signal))
      .finally(() => {
        if (this.runs.get(principalId) === shared) {
          this.runs.delete(principalId);
        }
      });

    const shared: SharedRun = { limits, promise, controller, callers: 0, abandoned: 0 };
    this.runs.set(principalId, shared);
    this.attach(shared, signal);
    return shared;
  }

  private attach(shared: SharedRun, signal?: AbortSignal): void {
    shared.callers++;
    if (!signal) return;

    const abandon = () => {
      shared.abandoned++;
      if (shared.abandoned === shared.callers) {
        shared.controller.abort();
      }
    };

    if (signal.aborted) {
      abandon();
    } else {
      signal.addEventListener('abort', abandon, { once: true });
    }
  }

  private async run(principalId: number, limits: RunLimits, signal: AbortSignal): Promise<SyncResult> {
    const result = emptyResult();

    if (signal.aborted) {
      return { ...result, cancelled: true };
    }

    const tokenOutcome = await this.tokens.getValidToken(principalId);
    if (tokenOutcome.status === 'needs_reauth') {
      console.warn(`[Sync] Principal ${principalId} needs re-authorization, skipping`);
      return { ...result, reauthRequired: true };
    }
    if (tokenOutcome.status === 'retryable') {
      this.record(result, null, tokenOutcome.error);
      return { ...result, aborted: true };
    }

    const state: RunState = {
      principalId,
      token: tokenOutcome.value.token,
      result,
      signal,
      limits,
      pagesLeft: this.maxPages,
    };

    const previous = await this.messages.getCursor(principalId);
    const previousHead = previous?.headMessageId ?? null;
    let backfill = previous?.backfill ?? [];

    // Reconciliation revisits known messages, so it walks past the previous head
    const top = newWalk(previousHead, limits.reconcile);
    const walks = [top];
    const topEnd = await this.walk(state, top, null);

    if (topEnd.kind !== 'stopped') {
      let head = previousHead;

      if (limits.reconcile) {
        if (top.gapless && (topEnd.kind === 'reached' || top.passedStop)) {
          head = top.firstListedId ?? previousHead;
        }
        // The whole listing was walked
        if (topEnd.kind === 'reached' && top.gapless) backfill = [];
      } else if (topEnd.kind === 'reached') {
        if (top.gapless) head = top.firstListedId ?? previousHead;

        if (backfill.length > 0) {
          const older = await this.walkBackfill(state, backfill, walks);
          if (older === null) {
            return this.finish(principalId, result, previous);
          }
          backfill = older;
        }
      } else if (top.firstListedId !== null) {
        // Failed messages get one more try when the backfill walks their page again
        head = top.firstListedId;
        backfill = [
          { pageCursor: top.gapless ? topEnd.resumeAt : top.gapPage, stopAtId: previousHead },
          ...backfill,
        ];
      }

      const walkedOlder = walks.length > 1;
      if (top.firstListedId !== null || walkedOlder) {
        const progressed = [...walks].reverse().find((w) => w.progressId !== null);
        const cursor: SyncCursor = {
          principalId,
          headMessageId: head,
          lastMessageId: progressed?.progressId ?? previous?.lastMessageId ?? null,
          backfill,
          updatedAt: this.now(),
        };
        await this.messages.setCursor(cursor);
        return this.finish(principalId, result, cursor);
      }
    }

    return this.finish(principalId, result, previous);
  }

  private finish(principalId: number, result: SyncResult, cursor: SyncCursor | null): SyncResult {
    result.cursor = cursor;
    console.log(
      `[Sync] Principal ${principalId}: ${result.fetched} fetched, ${result.ingested} ingested, ` +
        `${result.reconciled} reconciled, ${result.errors.length} errors` +
        (result.cancelled ? ' (cancelled)' : result.aborted ? ' (aborted)' : '')
    );
    return result;
  }

  /**
   * Walk the backfill ranges in order. Returns the ranges still open, or null when
   * the run stopped.
   */
  private async walkBackfill(
    state: RunState,
    ranges: BackfillRange[],
    walks: Walk[]
  ): Promise<BackfillRange[] | null> {
    const open: BackfillRange[] = [];

    for (const range of ranges) {
      if (open.length > 0) {
        open.push(range);
        continue;
      }

      const walk = newWalk(range.stopAtId);
      walks.push(walk);
      const end = await this.walk(state, walk, range.pageCursor);

      if (end.kind === 'stopped') return null;
      if (end.kind === 'truncated') {
        open.push({ pageCursor: end.resumeAt, stopAtId: range.stopAtId });
      }
    }
    return open;
  }

  private async walk(state: RunState, walk: Walk, startAt: string | null): Promise<WalkEnd> {
    const { result, signal, limits } = state;
    let pageCursor = startAt;

    for (;;) {
      if (signal.aborted) {
        result.cancelled = true;
        return { kind: 'stopped' };
      }
      if (result.fetched >= limits.maxMessages) {
        return { kind: 'truncated', resumeAt: pageCursor };
      }
      if (state.pagesLeft <= 0) {
        console.warn(`[Sync] Principal ${state.principalId}: stopped after ${this.maxPages} pages`);
        return { kind: 'truncated', resumeAt: pageCursor };
      }

      state.pagesLeft--;
      const listed = await this.provider.listMessageIds(
        state.token,
        pageCursor,
        this.pageSize,
        this.options.query
      );
      if (listed.status !== 'ok') {
        await this.fail(state, null, listed.error);
        return { kind: 'stopped' };
      }

      for (const id of listed.value.ids) {
        if (id === walk.stopAt) {
          walk.passedStop = true;
          if (!walk.passStop) return { kind: 'reached' };
        }
        walk.firstListedId ??= id;

        if (signal.aborted) {
          result.cancelled = true;
          return { kind: 'stopped' };
        }

        if (await this.messages.existsByProviderId(state.principalId, id)) {
          if (limits.reconcile && !(await this.reconcile(state, id))) {
            return { kind: 'stopped' };
          }
          this.advance(walk, id);
          continue;
        }

        if (result.fetched >= limits.maxMessages) {
          return { kind: 'truncated', resumeAt: pageCursor };
        }

        const fetched = await this.provider.fetchMessage(state.token, id);
        result.fetched++;

        if (fetched.status !== 'ok') {
          if (fetched.status === 'fatal' && fetched.error.code !== 'TOKEN_REVOKED') {
            this.record(result, id, fetched.error);
            if (walk.gapless) {
              walk.gapless = false;
              walk.gapPage = pageCursor;
            }
            continue;
          }
          await this.fail(state, id, fetched.error);
          return { kind: 'stopped' };
        }

        // Fetched but not yet stored: drop it, the next run fetches it again
        if (signal.aborted) {
          result.cancelled = true;
          return { kind: 'stopped' };
        }

        const { created } = await this.messages.upsert(
          this.normalize(state.principalId, fetched.value)
        );
        if (created) result.ingested++;
        this.advance(walk, id);
      }

      if (!listed.value.nextPageCursor) {
        return { kind: 'reached' };
      }
      pageCursor = listed.value.nextPageCursor;
    }
  }

  private advance(walk: Walk, id: string): void {
    if (walk.gapless) walk.progressId = id;
  }

  /**
   * Refresh read/starred/folder of a message already mirrored. Returns false when the
   * run has to stop.
   */
  private async reconcile(state: RunState, id: string): Promise<boolean> {
    const { result, principalId } = state;
    const labels = await this.provider.fetchLabels(state.token, id);
    if (labels.status !== 'ok') {
      if (labels.status === 'fatal' && labels.error.code !== 'TOKEN_REVOKED') {
        this.record(result, id, labels.error);
        return true;
      }
      await this.fail(state, id, labels.error);
      return false;
    }

    const existing = await this.messages.findByProviderId(principalId, id);
    if (!existing) return true;

    const flags = flagsFromLabels(labels.value);
    const changed =
      existing.isRead !== flags.isRead ||
      existing.isStarred !== flags.isStarred ||
      existing.folder !== flags.folder ||
      existing.labels.join(',') !== flags.labels.join(',');

    if (changed && (await this.messages.updateFlags(principalId, id, flags))) {
      result.reconciled++;
    }
    return true;
  }

  /**
   * A failure that ends the run. A revoked token also demotes the credential.
   */
  private async fail(state: RunState, id: string | null, error: MailError): Promise<void> {
    this.record(state.result, id, error);
    state.result.aborted = true;

    if (error.code === 'TOKEN_REVOKED') {
      await this.tokens.reportRevoked(state.principalId, state.token);
      state.result.reauthRequired = true;
    }
  }

  private record(result: SyncResult, id: string | null, error: MailError): void {
    console.error(`[Sync] ${id ? `Message ${id}` : 'Listing'} failed (${error.code}): ${error.message}`);
    result.errors.push({
      providerMessageId: id,
      code: error.code,
      message: error.message,
      retryable: error.retryable,
    });
  }

  private normalize(principalId: number, detail: MessageDetail): MessageRecord {
    const now = this.now();
    const flags = flagsFromLabels(detail.labels);

    return {
      principalId,
      providerMessageId: detail.providerMessageId,
      threadId: detail.threadId,
      subject: detail.subject,
      sender: detail.sender,
      recipients: detail.recipients,
      snippet: detail.snippet,
      body: detail.body,
      receivedAt: detail.sentAt ?? now,
      ...flags,
      direction: detail.labels.includes('SENT') ? 'outbound' : 'inbound',
      ...this.classify(detail),
      ingestedAt: now,
    };
  }

  private classify(detail: MessageDetail): Pick<MessageRecord, 'category' | 'summary' | 'sentiment'> {
    const classifier = this.options.classifier;
    if (!classifier) {
      return { category: null, summary: null, sentiment: null };
    }

    try {
      return classifier(`${detail.subject}\n\n${detail.body}`);
    } catch (error) {
      console.warn(`[Sync] Classification failed for ${detail.providerMessageId}: ${describeError(error)}`);
      return { category: null, summary: null, sentiment: null };
    }
  }
}
