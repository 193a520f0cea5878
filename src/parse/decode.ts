import { TextDecoder } from 'node:util';
import { ISO_SENTINEL_VALUE, UTF8_SENTINEL_VALUE } from '../charset.js';
import { MalformedInputError } from '../errors.js';
import type { Charset } from '../types.js';

const HEX_PAIR = /^[0-9a-fA-F]{2}$/;
const NUMERIC_ENTITY = /&#(?:[xX]([0-9a-fA-F]+)|(\d+));/g;

// the trailing `;` (%3B) is optional
const ISO_SENTINEL_PREFIX = ISO_SENTINEL_VALUE.slice(0, -3);

function decodeBytes(bytes: number[], charset: Charset, strict: boolean, input: string): string {
  if (charset === 'iso-8859-1') return bytes.map((byte) => String.fromCharCode(byte)).join('');
  const decoder = new TextDecoder('utf-8', { fatal: strict, ignoreBOM: true });
  try {
    return decoder.decode(Uint8Array.from(bytes));
  } catch (err) {
    throw new MalformedInputError(input, `Invalid UTF-8 sequence in: ${input}`, err);
  }
}

/**
 * Percent-decodes `input` (with `+` as space) under `charset`. In strict mode
 * a broken escape or an invalid UTF-8 sequence is a `MalformedInputError`;
 * otherwise broken escapes stay as written and invalid UTF-8 becomes U+FFFD.
 */
export function decodeComponent(input: string, charset: Charset, strict = true): string {
  const text = input.replace(/\+/g, ' ');
  let out = '';
  let bytes: number[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === '%') {
      const hex = text.slice(i + 1, i + 3);
      if (HEX_PAIR.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 3;
        continue;
      }
      if (strict) throw new MalformedInputError(input, `Invalid percent-encoding in: ${input}`);
    }
    if (bytes.length > 0) {
      out += decodeBytes(bytes, charset, strict, input);
      bytes = [];
    }
    out += ch;
    i += 1;
  }

  if (bytes.length > 0) out += decodeBytes(bytes, charset, strict, input);
  return out;
}

/** Replaces `&#9786;` and `&#x263A;` with the characters they reference. */
export function interpretNumericEntities(input: string): string {
  return input.replace(NUMERIC_ENTITY, (match, hex: string | undefined, dec: string | undefined) => {
    const codePoint = hex !== undefined ? parseInt(hex, 16) : Number(dec);
    return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
  });
}

/**
 * Charset announced by a raw (still encoded) sentinel value: `✓` encoded as
 * UTF-8 means utf-8, `&#10003;` means the form was sent as iso-8859-1.
 *
 * @throws MalformedInputError when the value is neither
 */
export function detectSentinelCharset(rawValue: string): Charset {
  const upper = rawValue.toUpperCase();
  if (upper === UTF8_SENTINEL_VALUE || rawValue === '✓') return 'utf-8';
  if (upper.startsWith(ISO_SENTINEL_PREFIX)) return 'iso-8859-1';
  throw new MalformedInputError(rawValue, `Unrecognised charset sentinel value: ${rawValue}`);
}
