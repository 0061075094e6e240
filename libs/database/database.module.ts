import { Global, Logger, Module } from "@nestjs/common";
import { Pool } from "pg";
import { databaseConfig } from "@config/index";
import type { DatabaseConfig } from "@config/index";
import { DatabasePort } from "@database/core/ports/out/database.port";
import { PgDatabaseClient } from "@database/infrastructure/pg/database.client";
import { PG_POOL, PgPool } from "@database/infrastructure/pg/pg-pool";

function createPool(config: DatabaseConfig): PgPool {
  const logger = new Logger("PgPool");
  const pool = new Pool({
    connectionString: config.url,
    max: config.poolSize,
  });
  // Idle client errors are emitted on the pool and would crash the process
  pool.on("error", (error) => {
    logger.error(`Idle database client failed: ${error.message}`, error.stack);
  });
  return pool;
}

/**
 * DatabaseModule - pg pool and the transactional client built on it.
 * Override DatabasePort to run without a database.
 */
@Global()
@Module({
  providers: [
    {
      provide: PG_POOL,
      useFactory: createPool,
      inject: [databaseConfig.KEY],
    },
    {
      provide: DatabasePort,
      useClass: PgDatabaseClient,
    },
  ],
  exports: [DatabasePort],
})
export class DatabaseModule {}
