import { EmptyKeyError, MalformedInputError, UnbalancedBracketsError } from '../errors.js';

export interface KeyPath {
  /** Top-level key. */
  base: string;
  /** Sub-keys in order; `''` is the append placeholder of `a[]`. */
  tokens: string[];
}

export interface SplitOptions {
  allowDots: boolean;
  allowEmpty: boolean;
  parseArrays: boolean;
}

type ScanState = 'plain' | 'bracket' | 'closed';

/**
 * Top-level key of `key` without validating the rest of it: everything up to
 * the first `[` (or `.` with `allowDots`). Agrees with `splitKey` whenever
 * that succeeds.
 */
export function baseKey(key: string, allowDots: boolean): string {
  for (let i = 0; i < key.length; i += 1) {
    const ch = key.charAt(i);
    if (ch === '[' || (allowDots && ch === '.')) return key.slice(0, i);
  }
  return key;
}

/**
 * Splits `base[k1][k2]` (and, with `allowDots`, `base.k1.k2`) into its base
 * key and sub-tokens, validating brackets in the same pass. Dots inside
 * brackets are literal.
 */
export function splitKey(key: string, options: SplitOptions): KeyPath {
  // the scan starts in plain state, so the first segment is always the base
  const segments: string[] = [];
  let buffer = '';
  let state: ScanState = 'plain';

  for (const ch of key) {
    if (state === 'bracket') {
      if (ch === '[') throw new UnbalancedBracketsError(key, `Nested bracket in key: ${key}`);
      if (ch === ']') {
        segments.push(buffer);
        buffer = '';
        state = 'closed';
      } else {
        buffer += ch;
      }
      continue;
    }

    if (ch === ']') throw new UnbalancedBracketsError(key, `Closing bracket without opening bracket in key: ${key}`);

    if (state === 'plain') {
      if (ch === '[') {
        segments.push(buffer);
        buffer = '';
        state = 'bracket';
      } else if (ch === '.' && options.allowDots) {
        segments.push(buffer);
        buffer = '';
      } else {
        buffer += ch;
      }
      continue;
    }

    // state === 'closed'
    if (ch === '[') {
      state = 'bracket';
    } else if (ch === '.' && options.allowDots) {
      state = 'plain';
    } else {
      throw new MalformedInputError(key, `Unexpected characters after closing bracket in key: ${key}`);
    }
  }

  if (state === 'bracket') throw new UnbalancedBracketsError(key);
  if (state === 'plain') segments.push(buffer);

  const [base = '', ...tokens] = segments;
  if (base === '' && !options.allowEmpty) {
    throw new EmptyKeyError(key, `Empty top-level key is not allowed: ${key}`);
  }
  if (!options.allowEmpty && !options.parseArrays && tokens.includes('')) {
    throw new EmptyKeyError(key);
  }
  return { base, tokens };
}

/**
 * Literal key standing for the sub-tokens left over once the depth limit is
 * reached: `[g][h][i]`, or `g.h.i` in dot notation.
 */
export function foldTokens(tokens: readonly string[], allowDots: boolean): string {
  return allowDots ? tokens.join('.') : tokens.map((token) => `[${token}]`).join('');
}
