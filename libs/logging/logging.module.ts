import { Module, Global } from "@nestjs/common";
import { LoggerPort } from "@logging/core/ports/out/logger.port";
import { LoggingUseCase } from "@logging/core/ports/in/logging.use-case";
import {
  createStdoutDestination,
  LOG_DESTINATION,
  PinoLogger,
} from "@logging/infrastructure/pino/pino.logger";
import { NestLoggerAdapter } from "@logging/infrastructure/nest/nest-logger.adapter";
import { ContextService } from "@logging/service/context.service";
import { LoggingService } from "@logging/service/logging.service";

/**
 * LoggingModule - NestJS module for the logging library.
 *
 * This module is marked as @Global() so it can be imported once in AppModule
 * and used throughout the application without re-importing.
 *
 * Override LOG_DESTINATION to capture output (tests) or redirect it.
 */
@Global()
@Module({
  providers: [
    {
      provide: LOG_DESTINATION,
      useFactory: createStdoutDestination,
    },
    {
      provide: LoggerPort,
      useClass: PinoLogger,
    },
    ContextService,
    LoggingService,
    {
      provide: LoggingUseCase,
      useExisting: LoggingService,
    },
    NestLoggerAdapter,
  ],
  exports: [
    LoggerPort,
    LoggingService,
    LoggingUseCase,
    ContextService,
    NestLoggerAdapter,
  ],
})
export class LoggingModule {}
