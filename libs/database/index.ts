export { DatabaseModule } from "./database.module";
export * from "./core/domain";
export {
  DatabasePort,
  DatabaseSession,
  QueryRows,
  Row,
} from "./core/ports/out/database.port";
export { PgDatabaseClient } from "./infrastructure/pg/database.client";
export {
  PG_POOL,
  PgPool,
  PgPoolClient,
  PgQueryable,
} from "./infrastructure/pg/pg-pool";
