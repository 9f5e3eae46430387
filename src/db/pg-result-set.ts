import pino from 'pino';
import type { RequestParams } from '../paging/params.js';
import { AppError, DatabaseError, InvalidColumnError, ValidationError, getErrorMessage } from '../utils/errors.js';
import type { Condition, OrderBy, Pager, QueryAttributes, ResultSet, Row } from './result-set.js';

const log = pino({ name: 'result-set' });

/** The slice of `pg.Pool` / `pg.Client` the result set needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
}

export interface SourceDefinition {
  table: string;
  columns: readonly string[];
  primaryColumns: readonly string[];
  /** Alias the table is selected under, `me` unless given. */
  alias?: string;
  controllerSearch?: (rs: PgResultSet, params: RequestParams) => ResultSet;
  controllerSort?: (rs: PgResultSet, params: RequestParams) => ResultSet;
}

interface QueryState {
  conditions: readonly Condition[];
  attrs: Readonly<QueryAttributes>;
}

// SQLSTATEs raised when a parameter cannot be cast to its column's type
const BAD_INPUT_CODES = new Set([
  '22P02', // invalid_text_representation
  '22003', // numeric_value_out_of_range
  '22007', // invalid_datetime_format
  '22008', // datetime_field_overflow
]);

function sqlState(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Escapes LIKE wildcards so user input matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Collects positional values while SQL text is assembled.
 */
class SqlParams {
  readonly values: unknown[] = [];

  push(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

/**
 * ResultSet over one PostgreSQL table, rendered to parameterised SQL for `pg`.
 */
export class PgResultSet implements ResultSet {
  readonly currentSourceAlias: string;
  readonly primaryColumns: readonly string[];
  readonly columns: readonly string[];
  readonly conditions: readonly Condition[];
  readonly attrs: Readonly<QueryAttributes>;
  readonly controllerSearch?: (params: RequestParams) => ResultSet;
  readonly controllerSort?: (params: RequestParams) => ResultSet;

  constructor(
    private readonly db: Queryable,
    private readonly source: SourceDefinition,
    state: QueryState = { conditions: [], attrs: {} },
  ) {
    if (source.primaryColumns.length === 0) {
      throw new AppError(`Source ${source.table} has no primary columns`, {
        code: 'INVALID_SOURCE',
        isOperational: false,
      });
    }
    for (const pk of source.primaryColumns) {
      if (!source.columns.includes(pk)) {
        throw new AppError(`Primary column ${pk} is not a column of ${source.table}`, {
          code: 'INVALID_SOURCE',
          isOperational: false,
        });
      }
    }

    this.currentSourceAlias = source.alias ?? 'me';
    this.primaryColumns = source.primaryColumns;
    this.columns = source.columns;
    this.conditions = state.conditions;
    this.attrs = state.attrs;

    const { controllerSearch, controllerSort } = source;
    if (controllerSearch) this.controllerSearch = (params) => controllerSearch(this, params);
    if (controllerSort) this.controllerSort = (params) => controllerSort(this, params);
  }

  search(where?: Condition, attrs?: QueryAttributes): PgResultSet {
    const merged: QueryAttributes = { ...this.attrs };
    if (attrs?.rows !== undefined) merged.rows = attrs.rows;
    if (attrs?.page !== undefined) merged.page = attrs.page;
    if (attrs?.orderBy !== undefined) merged.orderBy = attrs.orderBy;

    return new PgResultSet(this.db, this.source, {
      conditions: where ? [...this.conditions, where] : this.conditions,
      attrs: merged,
    });
  }

  // ── SQL rendering ────────────────────────────────────────────────

  /** Resolves `me.col` or `col` to a quoted, alias-qualified reference. */
  private columnRef(reference: string): string {
    const dot = reference.indexOf('.');
    let column = reference;
    if (dot !== -1) {
      if (reference.slice(0, dot) !== this.currentSourceAlias) {
        throw new InvalidColumnError(reference, this.source.table);
      }
      column = reference.slice(dot + 1);
    }
    if (!this.columns.includes(column)) {
      throw new InvalidColumnError(reference, this.source.table);
    }
    return `${quoteIdent(this.currentSourceAlias)}.${quoteIdent(column)}`;
  }

  private renderCondition(cond: Condition, params: SqlParams): string {
    switch (cond.op) {
      case 'eq':
        return `${this.columnRef(cond.column)} = ${params.push(cond.value)}`;
      case 'in': {
        const col = this.columnRef(cond.column);
        if (cond.values.length === 0) return 'FALSE';
        return `${col} = ANY(${params.push(cond.values)})`;
      }
      case 'like': {
        const col = this.columnRef(cond.column);
        if (cond.values.length === 0) return 'FALSE';
        const parts = cond.values.map((v) => `${col}::text ILIKE ${params.push(`%${escapeLike(v)}%`)}`);
        return parts.length === 1 ? parts[0] : `(${parts.join(' OR ')})`;
      }
      case 'and': {
        if (cond.conditions.length === 0) return 'TRUE';
        return `(${cond.conditions.map((c) => this.renderCondition(c, params)).join(' AND ')})`;
      }
      case 'or': {
        if (cond.conditions.length === 0) return 'FALSE';
        return `(${cond.conditions.map((c) => this.renderCondition(c, params)).join(' OR ')})`;
      }
    }
  }

  private whereClause(params: SqlParams): string {
    if (this.conditions.length === 0) return '';
    return ` WHERE ${this.conditions.map((c) => this.renderCondition(c, params)).join(' AND ')}`;
  }

  private orderClause(): string {
    const orderBy: readonly OrderBy[] = this.attrs.orderBy ?? [];
    if (orderBy.length === 0) return '';
    const parts = orderBy.map((o) => `${this.columnRef(o.column)} ${o.direction === 'desc' ? 'DESC' : 'ASC'}`);
    return ` ORDER BY ${parts.join(', ')}`;
  }

  private limitClause(params: SqlParams): string {
    const { rows } = this.attrs;
    if (rows === undefined) return '';
    const page = this.attrs.page ?? 1;
    const offset = Math.max(0, Math.round((page - 1) * rows));
    return ` LIMIT ${params.push(rows)} OFFSET ${params.push(offset)}`;
  }

  private fromClause(): string {
    return `${quoteIdent(this.source.table)} AS ${quoteIdent(this.currentSourceAlias)}`;
  }

  private selectList(columns: readonly string[]): string {
    return columns.map((c) => this.columnRef(c)).join(', ');
  }

  /** SELECT for the current conditions and attributes. */
  toSelect(): { text: string; values: unknown[] } {
    const params = new SqlParams();
    const where = this.whereClause(params);
    const text =
      `SELECT ${this.selectList(this.columns)} FROM ${this.fromClause()}` +
      `${where}${this.orderClause()}${this.limitClause(params)}`;
    return { text, values: params.values };
  }

  toCount(): { text: string; values: unknown[] } {
    const params = new SqlParams();
    const where = this.whereClause(params);
    return { text: `SELECT COUNT(*)::int AS count FROM ${this.fromClause()}${where}`, values: params.values };
  }

  /**
   * DELETE for the current conditions. A paged result set deletes through a
   * primary-key sub-select, since PostgreSQL's DELETE takes no LIMIT.
   */
  toDelete(): { text: string; values: unknown[] } {
    const params = new SqlParams();
    if (this.attrs.rows === undefined) {
      return { text: `DELETE FROM ${this.fromClause()}${this.whereClause(params)}`, values: params.values };
    }

    const pkList = this.primaryColumns.map(quoteIdent).join(', ');
    const where = this.whereClause(params);
    const subSelect =
      `SELECT ${this.selectList(this.primaryColumns)} FROM ${this.fromClause()}` +
      `${where}${this.orderClause()}${this.limitClause(params)}`;
    return {
      text: `DELETE FROM ${quoteIdent(this.source.table)} WHERE (${pkList}) IN (${subSelect})`,
      values: params.values,
    };
  }

  // ── Execution ────────────────────────────────────────────────────

  private async run(operation: string, query: { text: string; values: unknown[] }) {
    log.debug({ table: this.source.table, sql: query.text, values: query.values }, operation);
    try {
      return await this.db.query(query.text, query.values);
    } catch (err) {
      const code = sqlState(err);
      if (code !== undefined && BAD_INPUT_CODES.has(code)) {
        throw new ValidationError(getErrorMessage(err), { table: this.source.table, operation, sqlState: code });
      }
      throw new DatabaseError(operation, getErrorMessage(err), err instanceof Error ? err : undefined);
    }
  }

  async all(): Promise<Row[]> {
    const { rows } = await this.run('select', this.toSelect());
    return rows;
  }

  async count(): Promise<number> {
    const { rows } = await this.run('count', this.toCount());
    return Number(rows[0]?.count ?? 0);
  }

  async pager(): Promise<Pager> {
    const totalEntries = await this.count();
    const entriesPerPage = this.attrs.rows ?? Math.max(totalEntries, 1);
    return {
      totalEntries,
      entriesPerPage,
      currentPage: Math.floor(this.attrs.page ?? 1),
      lastPage: Math.max(1, Math.ceil(totalEntries / entriesPerPage)),
    };
  }

  async delete(): Promise<number> {
    const { rowCount } = await this.run('delete', this.toDelete());
    return rowCount ?? 0;
  }
}
