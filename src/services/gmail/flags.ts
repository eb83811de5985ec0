// Flag changes: applied to the mirror first, then pushed to Gmail as label edits
import { InvalidRequestError, NeedsReauthError, NotFoundError } from '../../shared/errors.js';
import { failure, ok } from '../../shared/types/api.js';
import type {
  Failure,
  MailProvider,
  MessageFlags,
  MessageFolder,
  MessageRepository,
  Ok,
} from '../../shared/types/api.js';
import { flagsFromLabels } from './message-parser.js';
import type { TokenLifecycleManager } from './tokens.js';

export interface FlagChange {
  read?: boolean;
  starred?: boolean;
  /** Target folder; sent and drafts cannot be moved into */
  folder?: MessageFolder;
}

export interface LabelDelta {
  add: string[];
  remove: string[];
}

export type PushOutcome =
  | Ok<MessageFlags>
  | Failure<'retryable'>
  | Failure<'fatal'>
  | Failure<'needs_reauth'>;

type Tokens = Pick<TokenLifecycleManager, 'getValidToken' | 'reportRevoked'>;

const FOLDER_DELTAS: Partial<Record<MessageFolder, LabelDelta>> = {
  inbox: { add: ['INBOX'], remove: ['TRASH', 'SPAM'] },
  archive: { add: [], remove: ['INBOX', 'TRASH', 'SPAM'] },
  trash: { add: ['TRASH'], remove: ['SPAM'] },
  spam: { add: ['SPAM'], remove: ['INBOX', 'TRASH'] },
};

/**
 * Translate a flag change into Gmail system label edits
 */
export function labelDelta(change: FlagChange): LabelDelta {
  const add = new Set<string>();
  const remove = new Set<string>();

  if (change.read !== undefined) {
    (change.read ? remove : add).add('UNREAD');
  }
  if (change.starred !== undefined) {
    (change.starred ? add : remove).add('STARRED');
  }
  if (change.folder !== undefined) {
    const delta = FOLDER_DELTAS[change.folder];
    if (!delta) {
      throw new InvalidRequestError(`Messages cannot be moved to ${change.folder}`);
    }
    delta.add.forEach((label) => add.add(label));
    delta.remove.forEach((label) => remove.add(label));
  }

  return { add: [...add], remove: [...remove] };
}

export function applyDelta(labels: string[], delta: LabelDelta): string[] {
  const next = labels.filter((label) => !delta.remove.includes(label));
  for (const label of delta.add) {
    if (!next.includes(label)) next.push(label);
  }
  return next;
}

export class FlagService {
  constructor(
    private tokens: Tokens,
    private provider: MailProvider,
    private messages: MessageRepository
  ) {}

  /**
   * Apply a change to the local copy. Returns the new flags and the label edits
   * still to be pushed to the provider.
   */
  async applyLocal(
    principalId: number,
    providerMessageId: string,
    change: FlagChange
  ): Promise<{ flags: MessageFlags; delta: LabelDelta }> {
    const delta = labelDelta(change);
    const existing = await this.messages.findByProviderId(principalId, providerMessageId);
    if (!existing) {
      throw new NotFoundError(`Message ${providerMessageId} is not mirrored for principal ${principalId}`);
    }

    const flags = flagsFromLabels(applyDelta(existing.labels, delta));
    await this.messages.updateFlags(principalId, providerMessageId, flags);
    return { flags, delta };
  }

  /**
   * Push label edits to Gmail. The provider's resulting labels overwrite the local flags.
   */
  async push(principalId: number, providerMessageId: string, delta: LabelDelta): Promise<PushOutcome> {
    const tokenOutcome = await this.tokens.getValidToken(principalId);
    if (tokenOutcome.status !== 'ok') {
      return tokenOutcome;
    }

    const token = tokenOutcome.value.token;
    const modified = await this.provider.modifyLabels(token, providerMessageId, delta.add, delta.remove);

    if (modified.status !== 'ok') {
      if (modified.error.code === 'TOKEN_REVOKED') {
        await this.tokens.reportRevoked(principalId, token);
        return failure(
          'needs_reauth',
          new NeedsReauthError(`Principal ${principalId} access was revoked`, { cause: modified.error })
        );
      }
      return modified;
    }

    const flags = flagsFromLabels(modified.value);
    await this.messages.updateFlags(principalId, providerMessageId, flags);
    return ok(flags);
  }
}
