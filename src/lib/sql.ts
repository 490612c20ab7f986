import type { QueryResult, QueryResultRow } from 'pg';

/**
 * The slice of `Pool` / `PoolClient` that repositories need. Accepting this
 * instead of the concrete client keeps read paths usable with either.
 */
export type SqlExecutor = {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
};
