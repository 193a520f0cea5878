export type NodeKey =
  | { readonly kind: 'named'; readonly name: string }
  | { readonly kind: 'indexed'; readonly index: number }
  | { readonly kind: 'pending' };

export function named(name: string): NodeKey {
  return { kind: 'named', name };
}

export function indexed(index: number): NodeKey {
  return { kind: 'indexed', index };
}

/** Placeholder for `[]`, replaced by the next free index once siblings are known. */
export const PENDING: NodeKey = Object.freeze({ kind: 'pending' });

const INDEX_TOKEN = /^(?:0|[1-9]\d*)$/;

/** Canonical decimal index: `0`, `7`, `15`. `01` and `-1` are names. */
export function isIndexToken(token: string): boolean {
  return INDEX_TOKEN.test(token);
}

export function sameKey(a: NodeKey, b: NodeKey): boolean {
  if (a.kind === 'named' && b.kind === 'named') return a.name === b.name;
  if (a.kind === 'indexed' && b.kind === 'indexed') return a.index === b.index;
  // pending keys are never equal, not even to each other
  return false;
}

export function keyToString(key: NodeKey): string {
  switch (key.kind) {
    case 'named':
      return key.name;
    case 'indexed':
      return String(key.index);
    case 'pending':
      return '';
  }
}
