/**
 * Public API exports for the logging library.
 * This allows clean imports: import { LoggingModule, LoggingService } from '@logging'
 */

// Module
export { LoggingModule } from "./logging.module";

// Domain
export * from "./core/domain";

// Ports
export { LoggingUseCase } from "./core/ports/in/logging.use-case";
export { LoggerPort, LogFields } from "./core/ports/out/logger.port";

// Services
export { LoggingService } from "./service/logging.service";
export { ContextService } from "./service/context.service";

// Infrastructure
export {
  PinoLogger,
  LOG_DESTINATION,
  createStdoutDestination,
} from "./infrastructure/pino/pino.logger";
export { NestLoggerAdapter } from "./infrastructure/nest/nest-logger.adapter";
