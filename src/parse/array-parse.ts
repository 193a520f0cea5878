import { ArrayLimitError } from '../errors.js';
import { indexed, isIndexToken, named, PENDING } from '../node/keys.js';
import type { NodeKey } from '../node/keys.js';
import { QsNode } from '../node/qs-node.js';
import type { NodeValue } from '../node/qs-node.js';
import { foldTokens } from './notation.js';

export interface ArrayParseLimits {
  depth: number;
  arrayLimit: number;
  allowDots: boolean;
}

function place(key: NodeKey, inner: QsNode | undefined, value: NodeValue): QsNode {
  return inner === undefined ? QsNode.leaf(key, value) : QsNode.wrap(key, inner);
}

/**
 * Translates `base[t1][t2]…=value` under array notation into a one-branch
 * node spine. Index tokens become indexed keys, `[]` a pending key, anything
 * else a named key. Built from the innermost token outwards.
 *
 * @throws ArrayLimitError when an index is above `arrayLimit`
 */
export function arrayParse(
  base: string,
  tokens: readonly string[],
  value: NodeValue,
  limits: ArrayParseLimits,
): QsNode {
  const nested = tokens.slice(0, limits.depth);
  const folded = tokens.slice(limits.depth);

  let inner: QsNode | undefined = folded.length > 0
    ? QsNode.leaf(named(foldTokens(folded, limits.allowDots)), value)
    : undefined;

  for (let i = nested.length - 1; i >= 0; i -= 1) {
    const token = nested[i] ?? '';
    if (token === '') {
      // `[]` in front of an index (or another `[]`) adds nothing: `a[][1]` is `a[1]`
      if (inner !== undefined && inner.key.kind !== 'named') continue;
      inner = place(PENDING, inner, value);
    } else if (isIndexToken(token)) {
      const index = Number(token);
      if (index > limits.arrayLimit) throw new ArrayLimitError(index, limits.arrayLimit);
      inner = place(indexed(index), inner, value);
    } else {
      inner = place(named(token), inner, value);
    }
  }

  return place(named(base), inner, value);
}
