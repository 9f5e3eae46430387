export { DoesPaging, DEFAULT_IGNORED_PARAMS, DEFAULT_PAGE_SIZE, parseDirection } from './paging/does-paging.js';
export type { DoesPagingOptions } from './paging/does-paging.js';
export { buildSearch, buildSort } from './paging/dispatch.js';
export type { QueryFragment, SearchHandler, SortHandler, DefaultSortHandler } from './paging/dispatch.js';
export { paramValue, paramValues, requestParamsSchema } from './paging/params.js';
export type { RequestParams } from './paging/params.js';
export { PgResultSet, escapeLike } from './db/pg-result-set.js';
export type { Queryable, SourceDefinition } from './db/pg-result-set.js';
export { and, eq, inList, like, or } from './db/result-set.js';
export type { Condition, OrderBy, Pager, QueryAttributes, ResultSet, Row, SortDirection } from './db/result-set.js';
export { AppError, DatabaseError, InvalidColumnError, MissingParameterError, ValidationError } from './utils/errors.js';
export { parsePagination } from './utils/pagination.js';
export type { PaginationParams } from './utils/pagination.js';
