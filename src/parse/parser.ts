import { SENTINEL_KEY } from '../charset.js';
import { resolveParseConfig } from '../config.js';
import type { ResolvedParseConfig } from '../config.js';
import { ArrayLimitError, QueryStringError } from '../errors.js';
import { isIndexToken } from '../node/keys.js';
import { defineEntry } from '../node/qs-node.js';
import type { NodeValue, QsNode } from '../node/qs-node.js';
import type { Charset, ParsedObject, ParseOptions } from '../types.js';
import { arrayParse } from './array-parse.js';
import { coerceValue } from './coerce.js';
import { decodeComponent, detectSentinelCharset, interpretNumericEntities } from './decode.js';
import { lhsParse } from './lhs-parse.js';
import { baseKey, splitKey } from './notation.js';

interface RawPair {
  rawKey: string;
  rawValue: string;
}

/** Per-call parse state. */
interface ParseState {
  /** One tree per top-level key, in order of first appearance. */
  readonly tree: Map<string, QsNode>;
  /** Top-level keys whose group has fallen back from array to object notation. */
  readonly demoted: Set<string>;
}

/**
 * Flat, order-preserving mapping of literal keys to every value supplied for
 * them. Used when the input cannot be parsed structurally.
 */
function flatMapping(pairs: readonly RawPair[], charset: Charset): ParsedObject {
  const grouped = new Map<string, string[]>();
  for (const { rawKey, rawValue } of pairs) {
    const key = decodeComponent(rawKey, charset, false);
    const value = decodeComponent(rawValue, charset, false);
    const values = grouped.get(key);
    if (values !== undefined) values.push(value);
    else grouped.set(key, [value]);
  }
  return Object.fromEntries(grouped);
}

export class QsParser {
  private readonly config: ResolvedParseConfig;

  constructor(options: ParseOptions = {}) {
    this.config = resolveParseConfig(options);
  }

  /**
   * Parses a query string into nested mappings. Never throws on malformed
   * input: when a key cannot be interpreted, the whole input is returned as
   * a flat mapping of literal keys to value lists and `onFallback` is called.
   */
  parse(input: string): ParsedObject {
    const pairs = this.tokenize(input);
    let charset = this.config.charset;
    try {
      let content = pairs;
      if (this.config.charsetSentinel) {
        const sentinel = pairs.find((pair) => pair.rawKey === SENTINEL_KEY);
        if (sentinel !== undefined) {
          charset = detectSentinelCharset(sentinel.rawValue);
          content = pairs.filter((pair) => pair !== sentinel);
        }
      }
      return this.parseStructured(content, charset);
    } catch (err) {
      if (!(err instanceof QueryStringError)) throw err;
      this.config.onFallback(err, input);
      return flatMapping(pairs, charset);
    }
  }

  private tokenize(input: string): RawPair[] {
    let query = input;
    if (this.config.fromUrl) {
      const hash = query.indexOf('#');
      if (hash >= 0) query = query.slice(0, hash);
      const mark = query.indexOf('?');
      if (mark >= 0) query = query.slice(mark + 1);
    }

    const pairs: RawPair[] = [];
    for (const part of query.split(this.config.delimiter)) {
      const eq = part.indexOf('=');
      // empty parts and bare words carry no pair
      if (eq < 0) continue;
      pairs.push({ rawKey: part.slice(0, eq), rawValue: part.slice(eq + 1) });
    }
    return pairs;
  }

  private parseStructured(pairs: readonly RawPair[], charset: Charset): ParsedObject {
    const state: ParseState = { tree: new Map(), demoted: new Set() };

    for (const { rawKey, rawValue } of pairs) {
      let key = decodeComponent(rawKey, charset);
      if (this.config.interpretNumericEntities) key = interpretNumericEntities(key);

      // keys dropped by the parameter limit are never validated
      if (
        state.tree.size >= this.config.parameterLimit
        && !state.tree.has(baseKey(key, this.config.allowDots))
      ) {
        continue;
      }

      let decoded = decodeComponent(rawValue, charset);
      if (this.config.interpretNumericEntities) decoded = interpretNumericEntities(decoded);
      const value = coerceValue(decoded, this.config);

      const { base, tokens } = splitKey(key, this.config);
      const existing = state.tree.get(base);

      const spine = this.translate(base, tokens, value, existing, state);
      if (existing === undefined) {
        state.tree.set(base, spine);
        continue;
      }
      existing.update(spine);
      if (!state.demoted.has(base) && existing.hasMixedKeysAlong(spine)) {
        existing.toObjectNotation();
        state.demoted.add(base);
      }
    }

    const result: ParsedObject = {};
    for (const [base, node] of state.tree) {
      defineEntry(result, base, node.serialize(this.config.allowSparse));
    }
    return result;
  }

  /**
   * Builds the spine for one pair. Array notation is tried first when it
   * applies; an index above `arrayLimit` demotes the key group to object
   * notation and the pair is read again as plain bracket notation.
   */
  private translate(
    base: string,
    tokens: readonly string[],
    value: NodeValue,
    existing: QsNode | undefined,
    state: ParseState,
  ): QsNode {
    const arrayNotation = this.config.parseArrays
      && !state.demoted.has(base)
      && tokens.some((token) => token === '' || isIndexToken(token));

    if (arrayNotation) {
      try {
        const spine = arrayParse(base, tokens, value, this.config);
        spine.resolvePending(existing, this.config.arrayLimit);
        return spine;
      } catch (err) {
        if (!(err instanceof ArrayLimitError)) throw err;
        existing?.toObjectNotation();
        state.demoted.add(base);
      }
    }

    return lhsParse(base, tokens, value, {
      depth: this.config.depth,
      allowDots: this.config.allowDots,
      // `[]` in a demoted group is kept as an empty key
      allowEmpty: this.config.allowEmpty || state.demoted.has(base),
    });
  }
}
