import { MalformedInputError } from '../errors.js';
import type { SortItem } from './types.js';

const FIELD = '[A-Za-z_][A-Za-z0-9_]*';
const SIGNED = new RegExp(`^([+-]?)(${FIELD})$`);
const CALL = new RegExp(`^(asc|desc)\\((${FIELD})\\)$`);
const SUFFIX = new RegExp(`^(${FIELD})\\.(asc|desc)$`);

/**
 * Reads one sort item as a filter factory receives it from a parsed
 * `sort_by` value: `name`, `+name`, `-name`, `asc(name)`, `desc(name)`,
 * `name.asc` or `name.desc`.
 */
export function parseSortItem(item: string): SortItem {
  const trimmed = item.trim();

  const signed = SIGNED.exec(trimmed);
  if (signed !== null) {
    const [, sign = '', field = ''] = signed;
    return { direction: sign === '-' ? -1 : 1, field };
  }
  const call = CALL.exec(trimmed);
  if (call !== null) {
    const [, order = '', field = ''] = call;
    return { direction: order === 'desc' ? -1 : 1, field };
  }
  const suffix = SUFFIX.exec(trimmed);
  if (suffix !== null) {
    const [, field = '', order = ''] = suffix;
    return { direction: order === 'desc' ? -1 : 1, field };
  }
  throw new MalformedInputError(item, `Invalid sort item: ${item}`);
}
