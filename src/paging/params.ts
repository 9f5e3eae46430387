import { z } from 'zod';

/**
 * Query-string parameters as the paging helpers see them. A key repeated in
 * the query string (`?name=a&name=b`) arrives as a list.
 */
export type RequestParams = Record<string, string | string[]>;

// JSON bodies may carry numeric ids; they are read as their decimal text.
const paramScalar = z.union([z.string(), z.number().finite().transform(String)]);

/**
 * Express `req.query` or a form/JSON body, minus the nested objects `qs`
 * builds from `a[b]=c`.
 */
export const requestParamsSchema = z.record(z.union([paramScalar, z.array(paramScalar)]));

/** All non-empty values for `key`. */
export function paramValues(params: RequestParams, key: string): string[] {
  const raw = params[key];
  if (raw === undefined) return [];
  const list = Array.isArray(raw) ? raw : [raw];
  return list.filter((v) => v !== '');
}

/** First non-empty value for `key`, or undefined. */
export function paramValue(params: RequestParams, key: string): string | undefined {
  return paramValues(params, key)[0];
}
