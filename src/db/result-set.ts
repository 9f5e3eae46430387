import type { RequestParams } from '../paging/params.js';

// ── Types ──────────────────────────────────────────────────────────

export type Row = Record<string, unknown>;

export type SortDirection = 'asc' | 'desc';

export interface OrderBy {
  column: string;
  direction: SortDirection;
}

/**
 * Filter tree. Column references are either bare (`name`) or qualified by
 * the result set's alias (`me.name`).
 */
export type Condition =
  | { op: 'eq'; column: string; value: string | number }
  | { op: 'like'; column: string; values: string[] }
  | { op: 'in'; column: string; values: Array<string | number> }
  | { op: 'and'; conditions: Condition[] }
  | { op: 'or'; conditions: Condition[] };

export interface QueryAttributes {
  rows?: number;
  page?: number;
  orderBy?: OrderBy[];
}

export interface Pager {
  totalEntries: number;
  entriesPerPage: number;
  currentPage: number;
  lastPage: number;
}

/**
 * A deferred query over one table. Every `search` returns a new result set;
 * nothing touches the database until `all`, `count`, `pager` or `delete`.
 */
export interface ResultSet {
  readonly currentSourceAlias: string;
  readonly primaryColumns: readonly string[];
  readonly columns: readonly string[];
  readonly conditions: readonly Condition[];
  readonly attrs: Readonly<QueryAttributes>;

  /** Narrow by `where` (ANDed with existing conditions) and/or override attributes. */
  search(where?: Condition, attrs?: QueryAttributes): ResultSet;
  all(): Promise<Row[]>;
  /** Rows matching the conditions, ignoring `rows`/`page`. */
  count(): Promise<number>;
  pager(): Promise<Pager>;
  /** Deletes the matching rows and resolves to how many went. */
  delete(): Promise<number>;

  controllerSearch?: (params: RequestParams) => ResultSet;
  controllerSort?: (params: RequestParams) => ResultSet;
}

// ── Condition helpers ──────────────────────────────────────────────

export function eq(column: string, value: string | number): Condition {
  return { op: 'eq', column, value };
}

export function like(column: string, values: string[]): Condition {
  return { op: 'like', column, values };
}

export function inList(column: string, values: Array<string | number>): Condition {
  return { op: 'in', column, values };
}

export function and(...conditions: Condition[]): Condition {
  return { op: 'and', conditions };
}

export function or(...conditions: Condition[]): Condition {
  return { op: 'or', conditions };
}
