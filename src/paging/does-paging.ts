import pino from 'pino';
import { and, eq, inList, like, or } from '../db/result-set.js';
import type { Condition, OrderBy, ResultSet, SortDirection } from '../db/result-set.js';
import { AppError, MissingParameterError, ValidationError } from '../utils/errors.js';
import { parsePagination } from '../utils/pagination.js';
import { paramValue, paramValues } from './params.js';
import type { RequestParams } from './params.js';

const log = pino({ name: 'does-paging' });

export const DEFAULT_PAGE_SIZE = 25;
export const DEFAULT_MAX_PAGE_SIZE = 100;
export const DEFAULT_IGNORED_PARAMS: readonly string[] = ['limit', 'start', 'sort', 'dir', '_dc', 'rm', 'xaction'];

export interface DoesPagingOptions {
  /** Rows per page when the request sends no `limit`. */
  pageSize?: number;
  /** Largest `limit` honoured; bigger requests get this many rows. */
  maxPageSize?: number;
  /** Keys `simpleSearch` never turns into filters. */
  ignoredParams?: readonly string[];
}

export function parseDirection(raw: string): SortDirection {
  const dir = raw.trim().toLowerCase();
  if (dir === 'asc' || dir === 'desc') return dir;
  throw new ValidationError('Query parameter (dir) must be asc or desc', { dir: raw });
}

/**
 * Maps the `limit`, `start`, `sort`, `dir` and `to_delete` query parameters,
 * plus free-form filter keys, onto a ResultSet.
 *
 * Every method takes the request parameters and a result set, and all but
 * `simpleDeletion` return a new result set.
 *
 * ```ts
 * const paging = new DoesPaging({ pageSize: 50 });
 * const people = paging.pageAndSort(params, paging.search(params, peopleResultSet(pool)));
 * res.json(await people.all());
 * ```
 */
export class DoesPaging {
  readonly pageSize: number;
  readonly maxPageSize: number;
  readonly ignoredParams: readonly string[];

  constructor(options: DoesPagingOptions = {}) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.maxPageSize = options.maxPageSize ?? Math.max(DEFAULT_MAX_PAGE_SIZE, this.pageSize);
    this.ignoredParams = options.ignoredParams ?? DEFAULT_IGNORED_PARAMS;
    if (!Number.isSafeInteger(this.pageSize) || this.pageSize < 1) {
      throw new AppError(`pageSize must be a positive integer, got ${this.pageSize}`, {
        code: 'CONFIGURATION_ERROR',
        isOperational: false,
      });
    }
    if (!Number.isSafeInteger(this.maxPageSize) || this.maxPageSize < this.pageSize) {
      throw new AppError(`maxPageSize must be an integer of at least pageSize (${this.pageSize}), got ${this.maxPageSize}`, {
        code: 'CONFIGURATION_ERROR',
        isOperational: false,
      });
    }
  }

  /** `sort`, then `paginate`. */
  pageAndSort(params: RequestParams, rs: ResultSet): ResultSet {
    return this.paginate(params, this.sort(params, rs));
  }

  /**
   * `limit` rows per page (default `pageSize`, at most `maxPageSize`),
   * starting at row `start`.
   */
  paginate(params: RequestParams, rs: ResultSet): ResultSet {
    const { rows, page } = parsePagination(
      { limit: paramValue(params, 'limit'), start: paramValue(params, 'start') },
      this.pageSize,
      this.maxPageSize,
    );
    return rs.search(undefined, { rows, page });
  }

  /** The result set's own `controllerSearch` when it has one, else `simpleSearch`. */
  search(params: RequestParams, rs: ResultSet): ResultSet {
    if (rs.controllerSearch) {
      return rs.controllerSearch(params);
    }
    return this.simpleSearch(params, rs);
  }

  /** The result set's own `controllerSort` when it has one, else `simpleSort`. */
  sort(params: RequestParams, rs: ResultSet): ResultSet {
    if (rs.controllerSort) {
      return rs.controllerSort(params);
    }
    return this.simpleSort(params, rs);
  }

  /**
   * Case-insensitive substring filter for every non-ignored, non-empty
   * parameter. Repeated values for one key are ORed; keys are ANDed.
   */
  simpleSearch(params: RequestParams, rs: ResultSet): ResultSet {
    const skips = new Set(this.ignoredParams);
    const filters: Condition[] = [];

    for (const key of Object.keys(params)) {
      if (skips.has(key)) continue;
      const values = paramValues(params, key);
      if (values.length === 0) continue;
      filters.push(like(`${rs.currentSourceAlias}.${key}`, values));
    }

    if (filters.length === 0) return rs;
    return rs.search(filters.length === 1 ? filters[0] : and(...filters));
  }

  /**
   * Orders by `sort` in direction `dir` when both are sent, otherwise by the
   * primary key.
   */
  simpleSort(params: RequestParams, rs: ResultSet): ResultSet {
    const alias = rs.currentSourceAlias;
    const sort = paramValue(params, 'sort');
    const dir = paramValue(params, 'dir');

    let orderBy: OrderBy[];
    if (sort && dir) {
      orderBy = [{ column: `${alias}.${sort}`, direction: parseDirection(dir) }];
    } else {
      orderBy = rs.primaryColumns.map((pk): OrderBy => ({ column: `${alias}.${pk}`, direction: 'asc' }));
    }
    return rs.search(undefined, { orderBy });
  }

  /**
   * Deletes the rows named by `to_delete` and resolves to their identifiers.
   *
   * With a single primary column every value may carry several ids separated
   * by commas (`to_delete=1,2,3`). With a composite key each value is one
   * comma-separated tuple in primary-column order
   * (`to_delete=1,7&to_delete=2,7`).
   */
  async simpleDeletion(params: RequestParams, rs: ResultSet): Promise<string[]> {
    const toDelete = paramValues(params, 'to_delete');
    if (toDelete.length === 0) {
      throw new MissingParameterError('to_delete');
    }

    const alias = rs.currentSourceAlias;
    const pks = rs.primaryColumns.map((pk) => `${alias}.${pk}`);

    let ids: string[];
    let expression: Condition;
    if (pks.length === 1) {
      ids = toDelete.flatMap((v) => v.split(',')).map((v) => v.trim()).filter((v) => v !== '');
      if (ids.length === 0) {
        throw new MissingParameterError('to_delete');
      }
      expression = inList(pks[0], ids);
    } else {
      ids = toDelete;
      expression = or(
        ...toDelete.map((tuple) => {
          const parts = tuple.split(',').map((v) => v.trim());
          if (parts.length !== pks.length) {
            throw new ValidationError(
              `Each to_delete value needs ${pks.length} comma-separated keys (${rs.primaryColumns.join(', ')})`,
              { to_delete: tuple },
            );
          }
          return and(...pks.map((pk, i) => eq(pk, parts[i])));
        }),
      );
    }

    const deleted = await rs.search(expression).delete();
    log.info({ requested: ids.length, deleted }, 'Simple deletion');
    return ids;
  }
}
