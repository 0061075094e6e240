import type { QueryResultRow } from "pg";

export type Row = QueryResultRow;

export interface QueryRows<T extends Row> {
  rows: T[];
  rowCount: number;
}

/**
 * Anything statements can be issued on: the pool itself or one
 * transaction's connection.
 */
export interface DatabaseSession {
  query<T extends Row = Row>(
    sql: string,
    params?: unknown[],
  ): Promise<QueryRows<T>>;
}

/**
 * DatabasePort - Outbound port for relational persistence.
 *
 * Driver failures surface as InfrastructureError, unique violations as
 * DuplicateResourceError.
 */
export abstract class DatabasePort implements DatabaseSession {
  abstract query<T extends Row = Row>(
    sql: string,
    params?: unknown[],
  ): Promise<QueryRows<T>>;

  /**
   * Run `work` on one connection between BEGIN and COMMIT.
   * Any rejection rolls the transaction back and is rethrown unchanged.
   */
  abstract transaction<T>(
    work: (session: DatabaseSession) => Promise<T>,
  ): Promise<T>;

  /**
   * Resolves when the database answers a trivial query.
   */
  abstract ping(): Promise<void>;
}
