import { ValidationError } from './errors.js';

export interface PaginationParams {
  /** Rows per page. */
  rows: number;
  /** One-based page; fractional when `start` is not a multiple of `rows`. */
  page: number;
  /** Zero-based row offset the page starts at. */
  offset: number;
}

function parseCount(name: string, raw: string): number {
  const trimmed = raw.trim();
  const value = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`Query parameter (${name}) must be a non-negative integer`, { [name]: raw });
  }
  return value;
}

/**
 * Turns the `limit` / `start` pair (row count and zero-based row offset) into
 * rows and page, with `page = start / limit + 1`. A `limit` above `maxLimit`
 * is clamped to it.
 */
export function parsePagination(
  query: { limit?: string; start?: string },
  defaultLimit: number,
  maxLimit: number,
): PaginationParams {
  const requested = query.limit ? parseCount('limit', query.limit) : defaultLimit;
  if (requested === 0) {
    throw new ValidationError('Query parameter (limit) must be greater than zero', { limit: query.limit });
  }
  const rows = Math.min(requested, maxLimit);
  const offset = query.start ? parseCount('start', query.start) : 0;
  const page = offset / rows + 1;
  return { rows, page, offset };
}
