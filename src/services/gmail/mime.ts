// RFC 822 message assembly for users.messages.send
import { InvalidRequestError } from '../../shared/errors.js';
import type { OutgoingMessage } from '../../shared/types/api.js';

const LINE_BREAK = /[\r\n]/;
const NON_ASCII = /[^\x20-\x7e]/;

function assertHeaderValue(name: string, value: string): void {
  if (LINE_BREAK.test(value)) {
    throw new InvalidRequestError(`${name} header must not contain line breaks`);
  }
}

/**
 * RFC 2047 "B" encoding for subjects outside printable ASCII
 */
export function encodeHeaderValue(value: string): string {
  if (!NON_ASCII.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/**
 * Build the message text. The output depends only on the input: no Date or
 * Message-ID header is added, the provider stamps both.
 */
export function composeMimeMessage(message: OutgoingMessage): string {
  if (!message.to.trim()) {
    throw new InvalidRequestError('Recipient is required');
  }
  assertHeaderValue('To', message.to);
  assertHeaderValue('Subject', message.subject);
  if (message.from !== undefined) {
    assertHeaderValue('From', message.from);
  }

  const body = message.body.replace(/\r\n|\r|\n/g, '\r\n');

  return [
    message.from !== undefined ? `From: ${message.from}` : null,
    `To: ${message.to}`,
    `Subject: ${encodeHeaderValue(message.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 8bit',
    '',
    body,
  ]
    .filter((line): line is string => line !== null)
    .join('\r\n');
}

/**
 * Base64 URL-safe encoding of the composed message, as the send endpoint expects in `raw`
 */
export function buildRawMessage(message: OutgoingMessage): string {
  return Buffer.from(composeMimeMessage(message), 'utf-8').toString('base64url');
}
