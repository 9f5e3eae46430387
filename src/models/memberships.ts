import { PgResultSet } from '../db/pg-result-set.js';
import type { Queryable, SourceDefinition } from '../db/pg-result-set.js';
import { eq, like } from '../db/result-set.js';
import { buildSearch } from '../paging/dispatch.js';

/** Composite key: one row per person per group. */
export const membershipsSource: SourceDefinition = {
  table: 'memberships',
  columns: ['person_id', 'group_id', 'role', 'joined_at'],
  primaryColumns: ['person_id', 'group_id'],
  controllerSearch: (rs, params) =>
    buildSearch(
      rs,
      {
        person_id: (v) => ({ where: eq('me.person_id', v) }),
        group_id: (v) => ({ where: eq('me.group_id', v) }),
        role: (v) => ({ where: like('me.role', [v]) }),
      },
      params,
    ),
};

export function membershipsResultSet(db: Queryable): PgResultSet {
  return new PgResultSet(db, membershipsSource);
}
