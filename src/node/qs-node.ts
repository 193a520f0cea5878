import { ArrayLimitError, MalformedInputError } from '../errors.js';
import type { ParsedObject, ParsedValue, Primitive } from '../types.js';
import { indexed, keyToString, named, sameKey } from './keys.js';
import type { NodeKey } from './keys.js';

export type NodeValue = Primitive | Primitive[];

/** How a node takes part in a merge: a single value, a value list, or a mapping of children. */
export type NodeShape = 'scalar' | 'list' | 'mapping';

type MergeStrategy =
  | 'accumulate'      // both leaves: values grow into one list
  | 'demote-existing' // existing leaf becomes a mapping, its value turned into a flag key
  | 'attach-flag'     // incoming leaf value becomes a flag key on the existing mapping
  | 'merge-children';

const MERGE_TABLE: Readonly<Record<NodeShape, Readonly<Record<NodeShape, MergeStrategy>>>> = {
  scalar: { scalar: 'accumulate', list: 'accumulate', mapping: 'demote-existing' },
  list: { scalar: 'accumulate', list: 'accumulate', mapping: 'demote-existing' },
  mapping: { scalar: 'attach-flag', list: 'attach-flag', mapping: 'merge-children' },
};

function asList(value: NodeValue | undefined): Primitive[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * String form of a leaf value when it has to become a key. Lists render as
 * `[x,y]`, the same spelling the parser reads back as a list literal.
 */
export function valueToKey(value: NodeValue | undefined): string {
  if (value === undefined) return '';
  if (Array.isArray(value)) return `[${value.map((item) => String(item)).join(',')}]`;
  return String(value);
}

function toPrimitive(data: unknown): Primitive | undefined {
  switch (typeof data) {
    case 'string':
    case 'number':
    case 'boolean':
      return data;
    case 'bigint':
      return data.toString();
    case 'object':
      return data === null ? null : undefined;
    default:
      return undefined;
  }
}

export function defineEntry(target: ParsedObject, key: string, value: ParsedValue): void {
  // defineProperty keeps keys such as "__proto__" as plain own properties
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * One node of a query-string tree. A leaf carries a value and no children;
 * an internal node carries children (unique by key) and no value.
 */
export class QsNode {
  readonly children: QsNode[] = [];

  constructor(
    public key: NodeKey,
    public value?: NodeValue,
  ) {}

  static leaf(key: NodeKey, value: NodeValue): QsNode {
    return new QsNode(key, value);
  }

  static wrap(key: NodeKey, child: QsNode): QsNode {
    const node = new QsNode(key);
    node.children.push(child);
    return node;
  }

  /**
   * Builds a tree from a native value. Arrays produce indexed children,
   * objects named children. When `filter` is given, only keys whose string
   * form is listed are loaded, at every level.
   */
  static load(
    key: NodeKey,
    data: unknown,
    filter: ReadonlyArray<string | number> | null = null,
    ancestors: readonly object[] = [],
  ): QsNode | undefined {
    if (filter !== null && !filter.some((entry) => String(entry) === keyToString(key))) {
      return undefined;
    }
    const node = new QsNode(key);
    if (data instanceof Date) {
      node.value = data.toISOString();
      return node;
    }
    if (typeof data === 'object' && data !== null) {
      if (ancestors.includes(data)) {
        throw new MalformedInputError(keyToString(key), `Cyclic value at key "${keyToString(key)}"`);
      }
      const entries: Array<[NodeKey, unknown]> = [];
      if (Array.isArray(data)) {
        data.forEach((item: unknown, index) => entries.push([indexed(index), item]));
      } else {
        for (const [name, item] of Object.entries(data)) entries.push([named(name), item]);
      }
      const lineage = [...ancestors, data];
      for (const [childKey, item] of entries) {
        const child = QsNode.load(childKey, item, filter, lineage);
        if (child !== undefined) node.children.push(child);
      }
      return node;
    }
    node.value = toPrimitive(data);
    return node;
  }

  get shape(): NodeShape {
    if (this.children.length > 0) return 'mapping';
    return Array.isArray(this.value) ? 'list' : 'scalar';
  }

  isLeaf(): boolean {
    return this.children.length === 0;
  }

  isEmpty(): boolean {
    return this.isLeaf() && this.value === undefined;
  }

  /** Internal node whose children are all indexed (or still pending). */
  isArray(): boolean {
    return !this.isLeaf() && this.children.every((child) => child.key.kind !== 'named');
  }

  isDefaultArray(): boolean {
    return this.isArray() && this.children.every((child) => child.isLeaf());
  }

  /** Both named and indexed children under the same node. */
  hasMixedKeys(): boolean {
    let hasNamed = false;
    let hasIndexed = false;
    for (const child of this.children) {
      if (child.key.kind === 'named') hasNamed = true;
      else hasIndexed = true;
    }
    return hasNamed && hasIndexed;
  }

  /**
   * Walks this tree along the path of `spine` (a one-branch tree that was
   * just merged into it) and reports whether any node on the way has mixed keys.
   */
  hasMixedKeysAlong(spine: QsNode): boolean {
    let node: QsNode | undefined = this;
    let step: QsNode | undefined = spine;
    while (node !== undefined && step !== undefined) {
      if (node.hasMixedKeys()) return true;
      const next: QsNode | undefined = step.children[0];
      node = next !== undefined ? node.child(next.key) : undefined;
      step = next;
    }
    return false;
  }

  maxIndex(): number {
    if (!this.isArray()) return -1;
    let max = -1;
    for (const child of this.children) {
      if (child.key.kind === 'indexed' && child.key.index > max) max = child.key.index;
    }
    return max;
  }

  child(key: NodeKey): QsNode | undefined {
    return this.children.find((candidate) => sameKey(candidate.key, key));
  }

  /** Merges `other`, supplied for the same key, into this node. */
  update(other: QsNode): void {
    const strategy = MERGE_TABLE[this.shape][other.shape];
    switch (strategy) {
      case 'accumulate':
        this.value = [...asList(this.value), ...asList(other.value)];
        return;
      case 'demote-existing':
        this.children.push(QsNode.leaf(named(valueToKey(this.value)), true));
        this.value = undefined;
        this.mergeChildren(other.children);
        return;
      case 'attach-flag':
        this.mergeChildren([QsNode.leaf(named(valueToKey(other.value)), true)]);
        return;
      case 'merge-children':
        this.mergeChildren(other.children);
        return;
      default: {
        const unreachable: never = strategy;
        throw new Error(`Unknown merge strategy: ${String(unreachable)}`);
      }
    }
  }

  private mergeChildren(incoming: readonly QsNode[]): void {
    for (const child of incoming) {
      const existing = this.child(child.key);
      if (existing !== undefined) existing.update(child);
      else this.children.push(child);
    }
    this.reorder();
  }

  /** Sorts array children by index; object children keep insertion order. */
  reorder(): void {
    if (!this.isArray()) return;
    const position = (node: QsNode): number =>
      node.key.kind === 'indexed' ? node.key.index : Number.MAX_SAFE_INTEGER;
    this.children.sort((a, b) => position(a) - position(b));
  }

  /**
   * Rewrites every indexed key below this node as the equivalent named key.
   * Children that collide after the rewrite are merged.
   */
  toObjectNotation(): void {
    const previous = this.children.splice(0, this.children.length);
    for (const child of previous) {
      child.toObjectNotation();
      if (child.key.kind === 'indexed') child.key = named(String(child.key.index));
      const existing = this.child(child.key);
      if (existing !== undefined) existing.update(child);
      else this.children.push(child);
    }
  }

  /**
   * Assigns every pending key below this node the next free index of the
   * matching node in `base` (the tree this node is about to be merged into).
   */
  resolvePending(base: QsNode | undefined, arrayLimit: number): void {
    for (const child of this.children) {
      child.resolvePending(base?.child(child.key), arrayLimit);
    }
    for (const child of this.children) {
      if (child.key.kind === 'pending') {
        child.key = indexed(base !== undefined ? base.maxIndex() + 1 : 0);
      }
      if (child.key.kind === 'indexed' && child.key.index > arrayLimit) {
        throw new ArrayLimitError(child.key.index, arrayLimit);
      }
    }
  }

  /**
   * Converts the tree into plain values. Array nodes become index-keyed
   * objects, or real (possibly sparse) arrays when `allowSparse` is set.
   */
  serialize(allowSparse = false): ParsedValue {
    if (this.isLeaf()) {
      return Array.isArray(this.value) ? [...this.value] : (this.value ?? null);
    }
    if (allowSparse && this.isArray()) {
      const items: ParsedValue[] = [];
      for (const child of this.children) {
        if (child.key.kind === 'indexed') items[child.key.index] = child.serialize(allowSparse);
      }
      return items;
    }
    const result: ParsedObject = {};
    for (const child of this.children) {
      defineEntry(result, keyToString(child.key), child.serialize(allowSparse));
    }
    return result;
  }
}
