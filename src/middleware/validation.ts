import { requestParamsSchema } from '../paging/params.js';
import type { RequestParams } from '../paging/params.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Validate query (or form) parameters for the paging helpers.
 * Throws a 400 ValidationError with flattened errors if validation fails.
 */
export function readParams(source: unknown): RequestParams {
  const result = requestParamsSchema.safeParse(source ?? {});
  if (!result.success) {
    throw new ValidationError('Invalid query parameters', { details: result.error.flatten() });
  }
  return result.data;
}
