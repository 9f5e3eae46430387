import { and } from '../db/result-set.js';
import type { Condition, QueryAttributes, ResultSet, SortDirection } from '../db/result-set.js';
import { parseDirection } from './does-paging.js';
import { paramValue } from './params.js';
import type { RequestParams } from './params.js';

/** What a dispatch handler adds to the query. */
export interface QueryFragment {
  where?: Condition;
  attrs?: QueryAttributes;
}

export type SearchHandler = (value: string) => QueryFragment;
export type SortHandler = (direction: SortDirection) => QueryFragment;
export type DefaultSortHandler = (column: string, direction: SortDirection) => QueryFragment;

/**
 * Base for `controllerSearch` hooks: every parameter with a handler in
 * `table` and a non-empty value contributes its fragment, and the merged
 * result is applied in a single `search`.
 *
 * Written as a `SourceDefinition.controllerSearch`, which receives the
 * result set as well; `PgResultSet` binds it, so `ResultSet.controllerSearch`
 * takes only the parameters.
 *
 * ```ts
 * const ticketsSource: SourceDefinition = {
 *   table: 'tickets',
 *   columns: ['id', 'status'],
 *   primaryColumns: ['id'],
 *   controllerSearch: (rs, params) => buildSearch(rs, {
 *     status: (v) => ({ where: eq('me.status', v) }),
 *   }, params),
 * };
 * ```
 */
export function buildSearch(
  rs: ResultSet,
  table: Record<string, SearchHandler>,
  params: RequestParams,
): ResultSet {
  const conditions: Condition[] = [];
  let attrs: QueryAttributes = {};

  for (const key of Object.keys(params)) {
    if (!Object.hasOwn(table, key)) continue;
    const value = paramValue(params, key);
    if (value === undefined) continue;

    const fragment = table[key](value);
    if (fragment.where) conditions.push(fragment.where);
    attrs = { ...attrs, ...fragment.attrs };
  }

  const where = conditions.length === 0 ? undefined : conditions.length === 1 ? conditions[0] : and(...conditions);
  return rs.search(where, attrs);
}

/**
 * Base for `controllerSort` hooks. A handler registered for the `sort`
 * value gets the direction (`asc` when `dir` is absent); any other column
 * goes to `fallback` when both `sort` and `dir` are present. With neither,
 * the result set is returned unordered.
 */
export function buildSort(
  rs: ResultSet,
  table: Record<string, SortHandler>,
  fallback: DefaultSortHandler,
  params: RequestParams,
): ResultSet {
  const sort = paramValue(params, 'sort');
  const dir = paramValue(params, 'dir');

  let fragment: QueryFragment = {};
  if (sort && Object.hasOwn(table, sort)) {
    fragment = table[sort](dir ? parseDirection(dir) : 'asc');
  } else if (sort && dir) {
    fragment = fallback(sort, parseDirection(dir));
  }

  return rs.search(fragment.where, fragment.attrs);
}
