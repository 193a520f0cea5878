import { resolveStringifyConfig } from '../config.js';
import type { ResolvedStringifyConfig } from '../config.js';
import { named } from '../node/keys.js';
import type { NodeKey } from '../node/keys.js';
import { QsNode } from '../node/qs-node.js';
import type { NodeValue } from '../node/qs-node.js';
import type { StringifyOptions } from '../types.js';
import { encodeComponent, sentinelPair } from './encode.js';
import { formatKey } from './format.js';

interface FlatPair {
  path: NodeKey[];
  values: string[];
}

interface KeyGroup {
  key: string;
  values: string[];
}

function valueStrings(value: NodeValue | undefined): string[] {
  if (value === undefined) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.map((item) => (item === null ? '' : String(item)));
}

export class QsStringifier {
  private readonly config: ResolvedStringifyConfig;

  constructor(options: StringifyOptions = {}) {
    this.config = resolveStringifyConfig(options);
  }

  /**
   * Renders `data` as a query string.
   *
   * @throws MalformedInputError when `data` contains a cycle
   */
  stringify(data: Record<string, unknown>): string {
    const pairs: FlatPair[] = [];
    for (const [name, item] of Object.entries(data)) {
      const node = QsNode.load(named(name), item, this.config.filter);
      if (node !== undefined) pairs.push(...this.flatten(node));
    }

    const groups = this.group(pairs);
    if (this.config.sort || this.config.sortReverse) {
      const direction = this.config.sortReverse ? -1 : 1;
      groups.sort((a, b) => direction * (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    }

    const parts = groups.flatMap((group) => this.render(group));
    if (this.config.charsetSentinel) parts.unshift(sentinelPair(this.config.charset));
    return parts.join(this.config.delimiter);
  }

  /** Depth-first (path, values) pairs of every leaf below `root`, in document order. */
  private flatten(root: QsNode): FlatPair[] {
    const out: FlatPair[] = [];
    const stack: Array<{ node: QsNode; path: NodeKey[] }> = [{ node: root, path: [root.key] }];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (entry === undefined) break;
      const { node, path } = entry;

      if (node.isLeaf()) {
        if (node.value !== undefined) out.push({ path, values: valueStrings(node.value) });
        continue;
      }
      if (this.config.arrayFormat === 'comma' && node.isDefaultArray()) {
        const values = node.children.flatMap((child) => valueStrings(child.value));
        if (values.length > 0) out.push({ path, values });
        continue;
      }
      for (let i = node.children.length - 1; i >= 0; i -= 1) {
        const child = node.children[i];
        if (child !== undefined) stack.push({ node: child, path: [...path, child.key] });
      }
    }
    return out;
  }

  /** Collects pairs under their formatted key, keeping first-seen order. */
  private group(pairs: readonly FlatPair[]): KeyGroup[] {
    const groups = new Map<string, KeyGroup>();
    for (const { path, values } of pairs) {
      const key = formatKey(path, this.config.arrayFormat, this.config.allowDots);
      const group = groups.get(key);
      if (group !== undefined) group.values.push(...values);
      else groups.set(key, { key, values: [...values] });
    }
    return [...groups.values()];
  }

  private render({ key, values }: KeyGroup): string[] {
    const { arrayFormat, charset, encode, encodeValuesOnly } = this.config;
    const encodeValue = (value: string): string =>
      encode || encodeValuesOnly ? encodeComponent(value, charset) : value;
    const renderedKey = encode && !encodeValuesOnly ? encodeComponent(key, charset) : key;

    if (arrayFormat === 'repeat' || arrayFormat === 'brackets') {
      return values.map((value) => `${renderedKey}=${encodeValue(value)}`);
    }
    return [`${renderedKey}=${values.map(encodeValue).join(',')}`];
  }
}
