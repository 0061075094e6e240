import { Injectable } from "@nestjs/common";
import { performance } from "perf_hooks";
import {
  LogLevel,
  RequestCompletion,
  RequestContext,
  RequestContextInit,
  RequestFailure,
  RequestOutcome,
  RequestUser,
} from "@logging/core/domain";
import { LoggingUseCase } from "@logging/core/ports/in/logging.use-case";
import { LogFields, LoggerPort } from "@logging/core/ports/out/logger.port";
import { ContextService } from "./context.service";

/**
 * LoggingService - Application layer service for structured request events.
 *
 * One event is emitted per lifecycle stage of a request (started, then one of
 * completed / failed / canceled). The terminal event carries everything the
 * request accumulated: user, handler metadata and the failure cause.
 */
@Injectable()
export class LoggingService extends LoggingUseCase {
  constructor(
    private readonly contextService: ContextService,
    private readonly logger: LoggerPort,
  ) {
    super();
  }

  override initializeContext(init: RequestContextInit): RequestContext {
    return new RequestContext(init, performance.now());
  }

  override addUserContext(user: RequestUser): void {
    this.contextService.addUserContext(user);
  }

  override addMetadata(metadata: Record<string, unknown>): void {
    this.contextService.addMetadata(metadata);
  }

  override startRequest(context: RequestContext): void {
    this.logger.write("info", "Request started", {
      ...context.correlationFields(),
      method: context.method,
      path: context.path,
      client_address: context.clientAddress,
      user_agent: context.userAgent,
      request_size: context.requestSize,
      ...(context.upstreamRequestId
        ? { upstream_request_id: context.upstreamRequestId }
        : {}),
    });
  }

  /**
   * Emit the terminal event of a request.
   * Failed requests log at warn for 4xx and error for 5xx.
   */
  override finalize(
    context: RequestContext,
    completion: RequestCompletion,
  ): void {
    const fields: LogFields = {
      ...context.correlationFields(),
      method: context.method,
      path: context.path,
      endpoint: completion.endpoint,
      status_code: completion.statusCode,
      duration_ms: Math.round(completion.durationMs * 1000) / 1000,
      request_size: context.requestSize,
      response_size: completion.responseSize,
      outcome: completion.outcome,
    };
    if (context.user) fields.user = context.user;
    if (Object.keys(context.metadata).length > 0) {
      fields.metadata = context.metadata;
    }

    switch (completion.outcome) {
      case RequestOutcome.COMPLETED:
        this.logger.write("info", "Request completed", fields);
        return;
      case RequestOutcome.CANCELED:
        this.logger.write("warn", "Request canceled", fields);
        return;
      case RequestOutcome.FAILED: {
        if (context.failure) fields.error = this.describeFailure(context.failure);
        const level: LogLevel = completion.statusCode >= 500 ? "error" : "warn";
        this.logger.write(level, "Request failed", fields);
        return;
      }
    }
  }

  override log(level: LogLevel, event: string, fields?: LogFields): void {
    this.logger.write(level, event, fields);
  }

  debug(event: string, fields?: LogFields): void {
    this.logger.write("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.logger.write("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.logger.write("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.logger.write("error", event, fields);
  }

  private describeFailure(failure: RequestFailure): LogFields {
    return {
      code: failure.code,
      message: failure.message,
      category: failure.category,
      exception: failure.exceptionName,
      ...(failure.validationErrors
        ? { validation_errors: failure.validationErrors }
        : {}),
      ...(failure.stack ? { stack: failure.stack } : {}),
    };
  }
}
