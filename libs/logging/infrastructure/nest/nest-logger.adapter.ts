import { Injectable, LoggerService } from "@nestjs/common";
import { LogLevel } from "@logging/core/domain";
import { LogFields, LoggerPort } from "@logging/core/ports/out/logger.port";

/**
 * NestLoggerAdapter - routes the framework's own logging (bootstrap, route
 * mapping, `new Logger(X.name)` calls) onto the structured sink.
 *
 * Nest passes the logger context as the last optional parameter, and for
 * errors the stack trace before it. A lone string after an error message is
 * the stack when it reads as one, the context otherwise.
 */
@Injectable()
export class NestLoggerAdapter implements LoggerService {
  constructor(private readonly logger: LoggerPort) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.emit("info", message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    const params = [...optionalParams];
    const context =
      params.length === 1 && isStackTrace(params[0])
        ? undefined
        : this.popContext(params);
    const fields: LogFields = context ? { context } : {};
    const stack = params.find(
      (param): param is string => typeof param === "string",
    );
    if (stack) fields.stack = stack;
    if (message instanceof Error) {
      fields.exception = message.name;
      fields.stack = message.stack;
    }
    this.logger.write("error", this.text(message), fields);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.emit("warn", message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.emit("debug", message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.emit("debug", message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.emit("fatal", message, optionalParams);
  }

  private emit(
    level: LogLevel,
    message: unknown,
    optionalParams: unknown[],
  ): void {
    const context = this.popContext([...optionalParams]);
    this.logger.write(
      level,
      this.text(message),
      context ? { context } : undefined,
    );
  }

  private popContext(params: unknown[]): string | undefined {
    const last = params[params.length - 1];
    if (typeof last !== "string") return undefined;
    params.pop();
    return last;
  }

  private text(message: unknown): string {
    if (typeof message === "string") return message;
    if (message instanceof Error) return message.message;
    return typeof message === "object" && message !== null
      ? JSON.stringify(message)
      : String(message);
  }
}

const STACK_TRACE_PATTERN = /^(.)+\n\s+at .+:\d+:\d+/;

function isStackTrace(value: unknown): boolean {
  return typeof value === "string" && STACK_TRACE_PATTERN.test(value);
}
