import { createHash } from 'node:crypto';

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * sha256 of the text with line endings normalised, so CRLF re-saves are no-ops.
 */
export function fingerprintText(text: string): string {
  return createHash('sha256').update(normalizeNewlines(text), 'utf8').digest('hex');
}
