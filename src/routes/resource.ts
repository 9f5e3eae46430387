import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import pino from 'pino';
import type { ResultSet } from '../db/result-set.js';
import { readParams } from '../middleware/validation.js';
import type { DoesPaging } from '../paging/does-paging.js';

export interface ResourceOptions {
  name: string;
  paging: DoesPaging;
  /** Fresh, unfiltered result set for the resource's table. */
  resultSet: () => ResultSet;
}

export interface ListResponse {
  data: Record<string, unknown>[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

/**
 * GET handler — filtered, sorted, paginated rows.
 *
 * Query params:
 *   limit  — Rows per page (default: the paging page size)
 *   start  — Zero-based offset of the first row
 *   sort   — Column to sort by (default: primary key)
 *   dir    — "asc" or "desc"
 *   other  — Substring filter on the column of the same name
 */
export function listRows({ paging, resultSet }: ResourceOptions) {
  return async (req: Request, res: Response<ListResponse>, next: NextFunction): Promise<void> => {
    try {
      const params = readParams(req.query);
      const rs = paging.pageAndSort(params, paging.search(params, resultSet()));
      const [data, pager] = await Promise.all([rs.all(), rs.pager()]);
      res.json({
        data,
        total: pager.totalEntries,
        page: pager.currentPage,
        limit: pager.entriesPerPage,
        totalPages: pager.lastPage,
      });
    } catch (err) {
      next(err);
    }
  };
}

/**
 * DELETE handler — removes the rows named by `to_delete`, read from the
 * query string or a form/JSON body.
 */
export function deleteRows({ name, paging, resultSet }: ResourceOptions) {
  const log = pino({ name: `${name}-api` });

  return async (req: Request, res: Response<{ deleted: string[] }>, next: NextFunction): Promise<void> => {
    try {
      const params = readParams({ ...req.query, ...req.body });
      const deleted = await paging.simpleDeletion(params, resultSet());
      log.info({ deleted }, 'Rows deleted');
      res.json({ deleted });
    } catch (err) {
      next(err);
    }
  };
}

export function resourceRouter(options: ResourceOptions): Router {
  const router = Router();
  const remove = deleteRows(options);

  router.get('/', listRows(options));
  router.delete('/', remove);
  router.post('/delete', remove);

  return router;
}
