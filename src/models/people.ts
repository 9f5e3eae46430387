import { PgResultSet } from '../db/pg-result-set.js';
import type { Queryable, SourceDefinition } from '../db/pg-result-set.js';
import { buildSort } from '../paging/dispatch.js';

export const peopleSource: SourceDefinition = {
  table: 'people',
  columns: ['id', 'first_name', 'last_name', 'email', 'created_at'],
  primaryColumns: ['id'],
  // "name" sorts by surname first; every other column sorts as sent
  controllerSort: (rs, params) =>
    buildSort(
      rs.search(undefined, { orderBy: [{ column: 'me.id', direction: 'asc' }] }),
      {
        name: (direction) => ({
          attrs: {
            orderBy: [
              { column: 'me.last_name', direction },
              { column: 'me.first_name', direction },
            ],
          },
        }),
      },
      (column, direction) => ({ attrs: { orderBy: [{ column: `me.${column}`, direction }] } }),
      params,
    ),
};

export function peopleResultSet(db: Queryable): PgResultSet {
  return new PgResultSet(db, peopleSource);
}
