import type { ParsedObject } from '../types.js';

export type SortDirection = 1 | -1;

export interface SortItem {
  direction: SortDirection;
  field: string;
}

export interface FieldSpec {
  sortable: boolean;
  filterable: boolean;
}

export type FieldRegistry = Readonly<Record<string, FieldSpec>>;

/**
 * Turns a parsed query mapping into a native query for some data source.
 * Implemented outside this package; it calls `parse`, never the reverse.
 */
export interface FilterFactory<TQuery> {
  buildQuery(parsed: ParsedObject, fields: FieldRegistry): TQuery;
  parseSortItem(item: string): SortItem;
}

/** Describes the fields an API exposes and checks a parsed query against them. */
export interface OutputModel<TQuery> {
  readonly fields: FieldRegistry;
  validate(parsed: ParsedObject, factory: FilterFactory<TQuery>): void;
}
