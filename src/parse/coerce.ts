import type { NodeValue } from '../node/qs-node.js';
import type { Primitive } from '../types.js';

export interface CoerceOptions {
  comma: boolean;
  parsePrimitive: boolean;
  primitiveStrict: boolean;
}

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?|\d+[eE][+-]?\d+)$/;
const STRICT_NULLS = ['null', 'None'];
const LOOSE_NULLS = ['null', 'none'];

/**
 * Coerces a decoded value to a number, boolean or null when its spelling
 * calls for it. Integers outside the safe range stay strings. Strict mode
 * knows `true`, `false`, `null` and `None` exactly as written; otherwise
 * `true`, `false`, `null` and `none` match in any case.
 */
export function toPrimitive(value: string, strict: boolean): Primitive {
  if (INTEGER.test(value)) {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value;
  }
  if (FLOAT.test(value)) {
    const n = Number(value);
    return Number.isFinite(n) ? n : value;
  }
  const word = strict ? value : value.toLowerCase();
  if (word === 'true') return true;
  if (word === 'false') return false;
  if ((strict ? STRICT_NULLS : LOOSE_NULLS).includes(word)) return null;
  return value;
}

/** `[b,c]` → `['b', 'c']`; `[]` → `[]`. */
function splitListLiteral(value: string): string[] | undefined {
  if (value.length < 2 || !value.startsWith('[') || !value.endsWith(']')) return undefined;
  const inner = value.slice(1, -1);
  return inner === '' ? [] : inner.split(',');
}

/**
 * Turns a decoded value into a leaf value: list literals and (with `comma`)
 * comma-separated values become lists, and primitives are coerced when
 * `parsePrimitive` is on. A comma split with a single item stays a scalar.
 */
export function coerceValue(value: string, options: CoerceOptions): NodeValue {
  const convert = (item: string): Primitive =>
    options.parsePrimitive ? toPrimitive(item, options.primitiveStrict) : item;

  const literal = splitListLiteral(value);
  if (literal !== undefined) return literal.map(convert);

  if (options.comma) {
    const items = value.split(',');
    return items.length === 1 ? convert(value) : items.map(convert);
  }
  return convert(value);
}
