// Gmail message parsing: headers, plain-text body, date and label-derived flags
import type { gmail_v1 } from 'googleapis';
import { MalformedResponseError } from '../../shared/errors.js';
import type { MessageDetail, MessageFlags, MessageFolder } from '../../shared/types/api.js';

export const DEFAULT_SUBJECT = '(No Subject)';
export const UNKNOWN_SENDER = 'Unknown';

// First matching system label decides the folder
const FOLDER_LABELS: Array<[label: string, folder: MessageFolder]> = [
  ['TRASH', 'trash'],
  ['SPAM', 'spam'],
  ['DRAFT', 'drafts'],
  ['INBOX', 'inbox'],
  ['SENT', 'sent'],
];

/**
 * Convert a full-format Gmail message into the provider-neutral detail record.
 * Missing headers fall back to defaults; a missing id or threadId is malformed.
 */
export function parseMessage(message: gmail_v1.Schema$Message): MessageDetail {
  if (!message.id || !message.threadId) {
    throw new MalformedResponseError('Gmail message is missing id or threadId');
  }

  const headers = message.payload?.headers ?? [];

  return {
    providerMessageId: message.id,
    threadId: message.threadId,
    subject: getHeader(headers, 'Subject') || DEFAULT_SUBJECT,
    sender: getHeader(headers, 'From') || UNKNOWN_SENDER,
    recipients: getHeader(headers, 'To') ?? '',
    snippet: message.snippet ?? '',
    body: extractPlainTextBody(message),
    sentAt: parseDateHeader(getHeader(headers, 'Date')),
    labels: message.labelIds ?? [],
  };
}

/**
 * Header lookup by exact name. Gmail preserves the sender's casing, and only the
 * canonical spelling is honoured.
 */
export function getHeader(
  headers: gmail_v1.Schema$MessagePartHeader[],
  name: string
): string | undefined {
  const header = headers.find((h) => h.name === name);
  return header?.value ?? undefined;
}

/**
 * Parse an RFC 2822 Date header. A trailing "(UTC)" style comment is dropped first.
 */
export function parseDateHeader(value: string | undefined): Date | null {
  if (!value) return null;

  const parsed = new Date(value.replace(/\s*\([^)]*\)\s*$/, '').trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function extractPlainTextBody(message: gmail_v1.Schema$Message): string {
  if (!message.payload) return '';

  function findTextPart(part: gmail_v1.Schema$MessagePart): string | null {
    if (part.mimeType === 'text/plain' && part.body?.data) {
      return Buffer.from(part.body.data, 'base64url').toString('utf-8');
    }
    if (part.parts) {
      for (const subPart of part.parts) {
        const text = findTextPart(subPart);
        if (text !== null) return text;
      }
    }
    return null;
  }

  return findTextPart(message.payload) ?? '';
}

export function folderFromLabels(labels: string[]): MessageFolder {
  for (const [label, folder] of FOLDER_LABELS) {
    if (labels.includes(label)) return folder;
  }
  return 'archive';
}

export function flagsFromLabels(labels: string[]): MessageFlags {
  return {
    isRead: !labels.includes('UNREAD'),
    isStarred: labels.includes('STARRED'),
    folder: folderFromLabels(labels),
    labels: [...labels],
  };
}
