import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { SpanKind } from "@opentelemetry/api";
import { readFile } from "fs/promises";
import { databaseConfig, pathConfig } from "@config/index";
import type { DatabaseConfig, PathConfig } from "@config/index";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";
import { SpanAttribute } from "@tracing/core/domain";
import { TracingUseCase } from "@tracing/core/ports/in/tracing.use-case";
import {
  DuplicateResourceError,
  InfrastructureError,
} from "@database/core/domain";
import {
  DatabasePort,
  DatabaseSession,
  QueryRows,
  Row,
} from "@database/core/ports/out/database.port";
import { PG_POOL, PgPool, PgPoolClient, PgQueryable } from "./pg-pool";

const UNIQUE_VIOLATION = "23505";

/**
 * PgDatabaseClient - pg implementation of DatabasePort.
 *
 * Every statement runs inside a CLIENT span parented on the active span, so
 * queries issued while handling a request show up under its trace.
 */
@Injectable()
export class PgDatabaseClient
  extends DatabasePort
  implements OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(PgDatabaseClient.name);

  constructor(
    @Inject(PG_POOL) private readonly pool: PgPool,
    @Inject(databaseConfig.KEY) private readonly config: DatabaseConfig,
    @Inject(pathConfig.KEY) private readonly paths: PathConfig,
    private readonly tracing: TracingUseCase,
    private readonly metrics: MetricsUseCase,
  ) {
    super();
  }

  async onModuleInit(): Promise<void> {
    if (!this.config.autoMigrate) return;

    const schema = await readFile(this.paths.schemaFile, "utf8");
    await this.query(schema);
    this.logger.log(`Database schema applied from ${this.paths.schemaFile}`);
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  query<T extends Row = Row>(
    sql: string,
    params: unknown[] = [],
  ): Promise<QueryRows<T>> {
    return this.execute<T>(this.pool, sql, params);
  }

  async transaction<T>(
    work: (session: DatabaseSession) => Promise<T>,
  ): Promise<T> {
    const client = await this.acquire();
    const session: DatabaseSession = {
      query: <R extends Row = Row>(sql: string, params: unknown[] = []) =>
        this.execute<R>(client, sql, params),
    };

    try {
      await this.execute(client, "BEGIN");
      const result = await work(session);
      await this.execute(client, "COMMIT");
      return result;
    } catch (error) {
      await this.rollback(session);
      throw error;
    } finally {
      client.release();
      this.reportConnections();
    }
  }

  async ping(): Promise<void> {
    await this.query("SELECT 1");
  }

  private async acquire(): Promise<PgPoolClient> {
    try {
      const client = await this.pool.connect();
      this.reportConnections();
      return client;
    } catch (error) {
      throw this.translate(error);
    }
  }

  private async rollback(session: DatabaseSession): Promise<void> {
    try {
      await session.query("ROLLBACK");
    } catch (rollbackError) {
      this.logger.error(
        "Transaction rollback failed",
        rollbackError instanceof Error ? rollbackError.stack : undefined,
      );
    }
  }

  private async execute<T extends Row>(
    executor: PgQueryable,
    sql: string,
    params: unknown[] = [],
  ): Promise<QueryRows<T>> {
    const operation = operationOf(sql);
    const span = this.tracing.startChildSpan(
      `db.${operation.toLowerCase()}`,
      {
        [SpanAttribute.DB_SYSTEM]: "postgresql",
        [SpanAttribute.DB_OPERATION]: operation,
        [SpanAttribute.DB_STATEMENT]: sql,
      },
      SpanKind.CLIENT,
    );

    try {
      const result = await executor.query<T>(sql, params);
      const rowCount = result.rowCount ?? 0;
      this.tracing.endSpan(span, {
        attributes: { [SpanAttribute.DB_ROWS_AFFECTED]: rowCount },
      });
      return { rows: result.rows, rowCount };
    } catch (error) {
      const translated = this.translate(error);
      this.tracing.endSpan(span, { error: translated });
      throw translated;
    }
  }

  private translate(error: unknown): Error {
    if (
      error instanceof InfrastructureError ||
      error instanceof DuplicateResourceError
    ) {
      return error;
    }

    if (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      error.code === UNIQUE_VIOLATION
    ) {
      const constraint =
        "constraint" in error && typeof error.constraint === "string"
          ? error.constraint
          : undefined;
      return new DuplicateResourceError(
        "Unique constraint violated",
        constraint,
      );
    }

    return new InfrastructureError("Database operation failed", "database", {
      cause: error,
    });
  }

  private reportConnections(): void {
    this.metrics.setDatabaseConnections(
      this.pool.totalCount - this.pool.idleCount,
    );
  }
}

function operationOf(sql: string): string {
  const keyword = sql.trim().split(/\s+/, 1)[0];
  return keyword ? keyword.toUpperCase() : "QUERY";
}
