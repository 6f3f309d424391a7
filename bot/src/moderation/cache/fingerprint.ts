import { createHash } from 'crypto';

const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF]/g;

export function normalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(ZERO_WIDTH, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * SHA-256 of the normalized text. Messages that differ only in case, spacing or
 * invisible characters share a fingerprint.
 */
export function fingerprint(text: string): string {
  return createHash('sha256').update(normalizeText(text), 'utf8').digest('hex');
}
