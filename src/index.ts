import { QsParser } from './parse/parser.js';
import { QsStringifier } from './stringify/stringifier.js';
import type { ParsedObject, ParseOptions, StringifyOptions } from './types.js';

export function parse(input: string, options?: ParseOptions): ParsedObject {
  return new QsParser(options).parse(input);
}

export function stringify(data: Record<string, unknown>, options?: StringifyOptions): string {
  return new QsStringifier(options).stringify(data);
}

export { QsParser, QsStringifier };
export type {
  ArrayFormat,
  Charset,
  DialectOptions,
  ParsedObject,
  ParsedValue,
  ParseOptions,
  Primitive,
  StringifyOptions,
} from './types.js';
export {
  ArrayLimitError,
  EmptyKeyError,
  InvalidOptionError,
  MalformedInputError,
  QueryStringError,
  UnbalancedBracketsError,
} from './errors.js';
export type { QueryStringErrorKind } from './errors.js';
export { parseSortItem } from './collaborators/sort-item.js';
export type {
  FieldRegistry,
  FieldSpec,
  FilterFactory,
  OutputModel,
  SortDirection,
  SortItem,
} from './collaborators/types.js';
