import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { serverConfig, ServerConfig } from "@config/index";
import { NestLoggerAdapter } from "@logging";
import { configureHttpPipeline } from "@observability";
import { AppModule } from "./app.module";

async function bootstrap(): Promise<void> {
  // Body parsing is mounted by the pipeline, behind request observability
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
    bodyParser: false,
  });
  app.useLogger(app.get(NestLoggerAdapter));
  configureHttpPipeline(app);

  app.enableShutdownHooks();
  const server = app.get<ServerConfig>(serverConfig.KEY);
  await app.listen(server.port, server.host);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger("Bootstrap");
  if (error instanceof Error) {
    logger.error(`Failed to start: ${error.message}`, error.stack);
  } else {
    logger.error(`Failed to start: ${String(error)}`);
  }
  process.exitCode = 1;
});
