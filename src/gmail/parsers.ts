/**
 * Gmail message parsing utilities
 * Converts Gmail API responses to our typed records and builds raw outgoing messages
 */
import type { gmail_v1 } from 'googleapis';
import type { EmailDetail, EmailSummary, OutgoingMessage } from './types.js';

/**
 * Extract a header value from Gmail message headers
 */
export function getHeader(
  headers: gmail_v1.Schema$MessagePartHeader[] | undefined,
  name: string
): string {
  return headers?.find(h => h.name?.toLowerCase() === name.toLowerCase())?.value || '';
}

export function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

export function encodeBase64Url(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}

/**
 * Parse message metadata into a summary (for list results)
 */
export function parseEmailSummary(message: gmail_v1.Schema$Message, id: string): EmailSummary {
  const headers = message.payload?.headers ?? undefined;

  return {
    id,
    subject: getHeader(headers, 'Subject'),
    from: getHeader(headers, 'From'),
    date: getHeader(headers, 'Date'),
    snippet: message.snippet || ''
  };
}

/**
 * Plain-text body of a message payload.
 *
 * Looks only at the payload itself or its direct children and takes the first
 * `text/plain` part with data. Nested multiparts and HTML-only messages give ''.
 */
export function extractPlainTextBody(payload: gmail_v1.Schema$MessagePart | undefined): string {
  if (!payload) return '';

  if (payload.parts) {
    for (const part of payload.parts) {
      if (part.mimeType === 'text/plain' && part.body?.data) {
        return decodeBase64Url(part.body.data);
      }
    }
    return '';
  }

  if (payload.mimeType === 'text/plain' && payload.body?.data) {
    return decodeBase64Url(payload.body.data);
  }
  return '';
}

/**
 * Parse a fully fetched message (for get operations)
 */
export function parseEmailDetail(message: gmail_v1.Schema$Message, id: string): EmailDetail {
  const headers = message.payload?.headers ?? undefined;

  return {
    id,
    subject: getHeader(headers, 'Subject'),
    from: getHeader(headers, 'From'),
    to: getHeader(headers, 'To'),
    date: getHeader(headers, 'Date'),
    body: extractPlainTextBody(message.payload ?? undefined)
  };
}

/**
 * RFC 2047 encoded-word for header values outside printable ASCII
 */
export function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/**
 * Build a text/plain RFC 822 message and return it base64url-encoded for the `raw` field.
 * Only the fields present are written as headers.
 */
export function buildRawMessage(message: OutgoingMessage): string {
  const lines: string[] = [];
  if (message.to !== undefined) lines.push(`To: ${message.to}`);
  if (message.subject !== undefined) lines.push(`Subject: ${encodeHeaderValue(message.subject)}`);
  lines.push('MIME-Version: 1.0');
  lines.push('Content-Type: text/plain; charset="UTF-8"');
  lines.push('Content-Transfer-Encoding: 8bit');
  lines.push('');
  lines.push(message.body ?? '');

  return encodeBase64Url(lines.join('\r\n'));
}
