import type { QueryStringError } from './errors.js';

export type Primitive = string | number | boolean | null;

export type ParsedValue = Primitive | ParsedValue[] | ParsedObject;

export interface ParsedObject {
  [key: string]: ParsedValue;
}

export type Charset = 'utf-8' | 'iso-8859-1';

export type ArrayFormat = 'indices' | 'brackets' | 'repeat' | 'comma';

/** Notation settings shared by the parser and the stringifier. */
export interface DialectOptions {
  /** Nesting levels kept before the remaining path is folded into one literal key. */
  depth?: number;
  /** Maximum number of distinct top-level keys admitted. */
  parameterLimit?: number;
  /** Accept (and emit) `a.b.c` in addition to `a[b][c]`. */
  allowDots?: boolean;
  /** Serialize array nodes as real arrays, keeping holes at missing indices. */
  allowSparse?: boolean;
  /** Highest array index accepted before the key group falls back to object notation. */
  arrayLimit?: number;
  parseArrays?: boolean;
  /** Accept empty key segments such as `a[]` without array parsing, and empty top-level keys. */
  allowEmpty?: boolean;
  /** Split values on commas. */
  comma?: boolean;
}

export interface ParseOptions extends DialectOptions {
  /** Input is a full URL; only its query component is parsed. */
  fromUrl?: boolean;
  delimiter?: string | RegExp;
  charset?: Charset;
  charsetSentinel?: boolean;
  interpretNumericEntities?: boolean;
  parsePrimitive?: boolean;
  /** Only the exact lowercase spellings `true`, `false` and `null` are coerced. */
  primitiveStrict?: boolean;
  /**
   * Called when the input cannot be parsed structurally and the flat
   * fallback mapping is returned instead.
   */
  onFallback?: (error: QueryStringError, input: string) => void;
}

export interface StringifyOptions {
  allowDots?: boolean;
  encode?: boolean;
  encodeValuesOnly?: boolean;
  delimiter?: string;
  arrayFormat?: ArrayFormat;
  sort?: boolean;
  sortReverse?: boolean;
  charset?: Charset;
  /** Keys (at any level) and array indices admitted into the output. */
  filter?: ReadonlyArray<string | number>;
  charsetSentinel?: boolean;
}
