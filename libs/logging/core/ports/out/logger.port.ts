import { LogLevel } from "@logging/core/domain";

export type LogFields = Record<string, unknown>;

/**
 * LoggerPort - the sink structured events are written to.
 * Implementations serialize one event per line and must not throw.
 */
export abstract class LoggerPort {
  abstract write(level: LogLevel, event: string, fields?: LogFields): void;

  abstract isLevelEnabled(level: LogLevel): boolean;
}
