// Send path: valid token -> raw message -> provider send -> outbound copy in the mirror
import { NeedsReauthError } from '../../shared/errors.js';
import { failure, ok } from '../../shared/types/api.js';
import type {
  MailProvider,
  MessageRecord,
  MessageRepository,
  PrincipalRepository,
  SendOutcome,
} from '../../shared/types/api.js';
import { UNKNOWN_SENDER } from './message-parser.js';
import type { TokenLifecycleManager } from './tokens.js';

const SNIPPET_LENGTH = 200;

type Tokens = Pick<TokenLifecycleManager, 'getValidToken' | 'reportRevoked'>;

export function snippetOf(body: string): string {
  return body.replace(/\s+/g, ' ').trim().slice(0, SNIPPET_LENGTH);
}

export class SendService {
  constructor(
    private tokens: Tokens,
    private provider: MailProvider,
    private principals: PrincipalRepository,
    private messages: MessageRepository,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Send a plain-text message and store the outbound copy under the provider's id,
   * so a later sync sees it as known. Failures are returned, never retried here.
   */
  async sendMessage(
    principalId: number,
    to: string,
    subject: string,
    body: string
  ): Promise<SendOutcome> {
    const tokenOutcome = await this.tokens.getValidToken(principalId);
    if (tokenOutcome.status !== 'ok') {
      return tokenOutcome;
    }

    const principal = await this.principals.get(principalId);
    const token = tokenOutcome.value.token;

    const sent = await this.provider.sendMessage(token, {
      from: principal?.email,
      to,
      subject,
      body,
    });

    if (sent.status !== 'ok') {
      if (sent.error.code === 'TOKEN_REVOKED') {
        await this.tokens.reportRevoked(principalId, token);
        return failure(
          'needs_reauth',
          new NeedsReauthError(`Principal ${principalId} access was revoked`, { cause: sent.error })
        );
      }
      console.error(`[Send] Principal ${principalId} send failed (${sent.error.code}): ${sent.error.message}`);
      return sent;
    }

    const now = this.now();
    const record: MessageRecord = {
      principalId,
      providerMessageId: sent.value.providerId,
      threadId: sent.value.threadId,
      subject,
      sender: principal?.email ?? UNKNOWN_SENDER,
      recipients: to,
      snippet: snippetOf(body),
      body,
      receivedAt: now,
      isRead: true,
      isStarred: false,
      folder: 'sent',
      labels: ['SENT'],
      direction: 'outbound',
      category: null,
      summary: null,
      sentiment: null,
      ingestedAt: now,
    };

    await this.messages.upsert(record);
    console.log(`[Send] ✓ Principal ${principalId} sent ${record.providerMessageId}`);
    return ok(record);
  }
}
