import { EmptyKeyError } from '../errors.js';
import { named } from '../node/keys.js';
import { QsNode } from '../node/qs-node.js';
import type { NodeValue } from '../node/qs-node.js';
import { foldTokens } from './notation.js';

export interface LhsParseOptions {
  depth: number;
  allowDots: boolean;
  allowEmpty: boolean;
}

/**
 * Translates `base[t1][t2]…=value` (or its dot form) into a one-branch node
 * spine with named keys only. Tokens past `depth` are folded into a single
 * literal key holding the value.
 *
 * @throws EmptyKeyError on an empty token unless `allowEmpty` is set
 */
export function lhsParse(
  base: string,
  tokens: readonly string[],
  value: NodeValue,
  options: LhsParseOptions,
): QsNode {
  if (!options.allowEmpty && tokens.includes('')) {
    throw new EmptyKeyError(`${base}${foldTokens(tokens, false)}`);
  }

  const nested = tokens.slice(0, options.depth);
  const folded = tokens.slice(options.depth);

  let node = folded.length > 0
    ? QsNode.leaf(named(foldTokens(folded, options.allowDots)), value)
    : undefined;

  for (let i = nested.length - 1; i >= 0; i -= 1) {
    const key = named(nested[i] ?? '');
    node = node === undefined ? QsNode.leaf(key, value) : QsNode.wrap(key, node);
  }

  return node === undefined ? QsNode.leaf(named(base), value) : QsNode.wrap(named(base), node);
}
