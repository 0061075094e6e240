import { Inject, Injectable } from "@nestjs/common";
import pino, { DestinationStream, Logger, LoggerOptions } from "pino";
import pretty from "pino-pretty";
import { observabilityConfig, serviceConfig } from "@config/index";
import type { ObservabilityConfig, ServiceConfig } from "@config/index";
import { LogFormat, LogLevel } from "@logging/core/domain";
import { LogFields, LoggerPort } from "@logging/core/ports/out/logger.port";
import { ContextService } from "@logging/service/context.service";

/**
 * Raw line sink the logger writes to. Bound to stdout in production and to
 * an in-memory stream in tests.
 */
export const LOG_DESTINATION = Symbol("LOG_DESTINATION");

export function createStdoutDestination(): DestinationStream {
  // sync: every event reaches the fd as one complete line before write returns
  return pino.destination({ dest: 1, sync: true });
}

/**
 * PinoLogger - Infrastructure implementation of LoggerPort.
 * Serializes events with pino; JSON lines by default, or one pretty line per
 * event when LOG_FORMAT=plain.
 */
@Injectable()
export class PinoLogger extends LoggerPort {
  private readonly logger: Logger;

  constructor(
    @Inject(serviceConfig.KEY) service: ServiceConfig,
    @Inject(observabilityConfig.KEY) observability: ObservabilityConfig,
    @Inject(LOG_DESTINATION) destination: DestinationStream,
    private readonly contextService: ContextService,
  ) {
    super();
    const options: LoggerOptions = {
      level: observability.logLevel,
      base: {
        service: service.name,
        version: service.version,
        environment: service.environment,
      },
      messageKey: "event",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      // Explicit fields passed to write() win over these
      mixin: () => this.contextService.getContext()?.correlationFields() ?? {},
    };

    this.logger = pino(
      options,
      observability.logFormat === LogFormat.PLAIN
        ? this.plainStream(destination)
        : destination,
    );
  }

  write(level: LogLevel, event: string, fields?: LogFields): void {
    if (fields) {
      this.logger[level](fields, event);
    } else {
      this.logger[level](event);
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  private plainStream(destination: DestinationStream): DestinationStream {
    const render = pretty.prettyFactory({
      colorize: false,
      messageKey: "event",
      ignore: "pid,hostname",
      translateTime: "SYS:standard",
      singleLine: true,
    });
    return {
      write: (line: string) => {
        destination.write(render(line));
      },
    };
  }
}
