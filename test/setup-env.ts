import "reflect-metadata";

process.env.ENVIRONMENT = "test";
process.env.JWT_SECRET = "test-secret";
process.env.BCRYPT_ROUNDS = "4";
process.env.TRACING_ENABLED = "true";
process.env.DATABASE_AUTO_MIGRATE = "false";
process.env.LOG_LEVEL = "debug";
