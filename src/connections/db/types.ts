import { QueryResult, QueryResultRow } from 'pg';

/**
 * The part of a pg Pool / PoolClient the repositories talk to
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}
