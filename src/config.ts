import { InvalidOptionError } from './errors.js';
import type { QueryStringError } from './errors.js';
import type {
  ArrayFormat,
  Charset,
  DialectOptions,
  ParseOptions,
  StringifyOptions,
} from './types.js';

export const CHARSETS: readonly Charset[] = ['utf-8', 'iso-8859-1'];
export const ARRAY_FORMATS: readonly ArrayFormat[] = ['indices', 'brackets', 'repeat', 'comma'];

export interface DialectConfig {
  readonly depth: number;
  readonly parameterLimit: number;
  readonly allowDots: boolean;
  readonly allowSparse: boolean;
  readonly arrayLimit: number;
  readonly parseArrays: boolean;
  readonly allowEmpty: boolean;
  readonly comma: boolean;
}

export interface ResolvedParseConfig extends DialectConfig {
  readonly fromUrl: boolean;
  readonly delimiter: string | RegExp;
  readonly charset: Charset;
  readonly charsetSentinel: boolean;
  readonly interpretNumericEntities: boolean;
  readonly parsePrimitive: boolean;
  readonly primitiveStrict: boolean;
  readonly onFallback: (error: QueryStringError, input: string) => void;
}

export interface ResolvedStringifyConfig {
  readonly allowDots: boolean;
  readonly encode: boolean;
  readonly encodeValuesOnly: boolean;
  readonly delimiter: string;
  readonly arrayFormat: ArrayFormat;
  readonly sort: boolean;
  readonly sortReverse: boolean;
  readonly charset: Charset;
  readonly filter: ReadonlyArray<string | number> | null;
  readonly charsetSentinel: boolean;
}

function nonNegativeInteger(option: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidOptionError(option, value, `Option "${option}" must be a non-negative integer, got ${value}`);
  }
  return value;
}

function oneOf<T extends string>(option: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidOptionError(
      option,
      value,
      `Option "${option}" must be one of ${allowed.join(', ')}, got "${value}"`,
    );
  }
  return match;
}

export function resolveDialect(options: DialectOptions = {}): DialectConfig {
  const parameterLimit = options.parameterLimit ?? 1000;
  if (parameterLimit !== Infinity && (!Number.isInteger(parameterLimit) || parameterLimit < 1)) {
    throw new InvalidOptionError(
      'parameterLimit',
      parameterLimit,
      `Option "parameterLimit" must be a positive integer or Infinity, got ${parameterLimit}`,
    );
  }
  return {
    depth: nonNegativeInteger('depth', options.depth ?? 5),
    parameterLimit,
    allowDots: options.allowDots ?? false,
    allowSparse: options.allowSparse ?? false,
    arrayLimit: nonNegativeInteger('arrayLimit', options.arrayLimit ?? 20),
    parseArrays: options.parseArrays ?? false,
    allowEmpty: options.allowEmpty ?? false,
    comma: options.comma ?? false,
  };
}

export function resolveParseConfig(options: ParseOptions = {}): ResolvedParseConfig {
  const delimiter = options.delimiter ?? '&';
  if (delimiter === '') {
    throw new InvalidOptionError('delimiter', delimiter, 'Option "delimiter" must not be empty');
  }
  return Object.freeze({
    ...resolveDialect(options),
    fromUrl: options.fromUrl ?? false,
    delimiter,
    charset: oneOf('charset', options.charset ?? 'utf-8', CHARSETS),
    charsetSentinel: options.charsetSentinel ?? false,
    interpretNumericEntities: options.interpretNumericEntities ?? false,
    parsePrimitive: options.parsePrimitive ?? false,
    primitiveStrict: options.primitiveStrict ?? true,
    onFallback: options.onFallback ?? ((error: QueryStringError) => {
      console.warn(`[querytree] falling back to flat parsing: ${error.message}`);
    }),
  });
}

export function resolveStringifyConfig(options: StringifyOptions = {}): ResolvedStringifyConfig {
  return Object.freeze({
    allowDots: options.allowDots ?? false,
    encode: options.encode ?? true,
    encodeValuesOnly: options.encodeValuesOnly ?? false,
    delimiter: options.delimiter ?? '&',
    arrayFormat: oneOf('arrayFormat', options.arrayFormat ?? 'indices', ARRAY_FORMATS),
    sort: options.sort ?? false,
    sortReverse: options.sortReverse ?? false,
    charset: oneOf('charset', options.charset ?? 'utf-8', CHARSETS),
    filter: options.filter !== undefined ? Object.freeze([...options.filter]) : null,
    charsetSentinel: options.charsetSentinel ?? false,
  });
}
