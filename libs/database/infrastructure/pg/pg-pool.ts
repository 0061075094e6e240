import type { QueryResult, QueryResultRow } from "pg";

export const PG_POOL = Symbol("PG_POOL");

/**
 * The slice of pg's Pool and PoolClient the client uses.
 */
export interface PgQueryable {
  query<R extends QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

export interface PgPoolClient extends PgQueryable {
  release(err?: Error | boolean): void;
}

export interface PgPool extends PgQueryable {
  readonly totalCount: number;
  readonly idleCount: number;
  connect(): Promise<PgPoolClient>;
  end(): Promise<void>;
}
