import { TextEncoder } from 'node:util';
import { ISO_SENTINEL_VALUE, SENTINEL_KEY, UTF8_SENTINEL_VALUE } from '../charset.js';
import type { Charset } from '../types.js';

const UNRESERVED = /^[A-Za-z0-9\-._~]$/;
const utf8 = new TextEncoder();

function percent(byte: number): string {
  return `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
}

/**
 * Percent-encodes everything outside `A-Z a-z 0-9 - . _ ~`. Under
 * iso-8859-1, characters above U+00FF are written as an encoded numeric
 * character reference (`%26%239786%3B`).
 */
export function encodeComponent(input: string, charset: Charset): string {
  let out = '';
  for (const ch of input) {
    if (UNRESERVED.test(ch)) {
      out += ch;
      continue;
    }
    if (charset === 'iso-8859-1') {
      const codePoint = ch.codePointAt(0) ?? 0;
      out += codePoint <= 0xff ? percent(codePoint) : `%26%23${codePoint}%3B`;
      continue;
    }
    for (const byte of utf8.encode(ch)) out += percent(byte);
  }
  return out;
}

/** The `utf8=✓` pair as a form in `charset` would submit it. */
export function sentinelPair(charset: Charset): string {
  return `${SENTINEL_KEY}=${charset === 'utf-8' ? UTF8_SENTINEL_VALUE : ISO_SENTINEL_VALUE}`;
}
