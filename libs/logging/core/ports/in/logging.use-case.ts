import {
  LogLevel,
  RequestCompletion,
  RequestContext,
  RequestContextInit,
  RequestUser,
} from "@logging/core/domain";
import { LogFields } from "@logging/core/ports/out/logger.port";

/**
 * LoggingUseCase - Inbound port for structured logging.
 *
 * Responsibilities:
 * - Request context lifecycle (initialize, enrich, report once at the end)
 * - Domain events from handlers, enriched with the active request's
 *   correlation id at emission
 */
export abstract class LoggingUseCase {
  /**
   * Create the context for a new request. Called once by the request
   * middleware before anything else runs.
   */
  abstract initializeContext(init: RequestContextInit): RequestContext;

  /**
   * Attach the authenticated user to the current request.
   */
  abstract addUserContext(user: RequestUser): void;

  /**
   * Merge domain-specific fields into the current request's terminal event.
   */
  abstract addMetadata(metadata: Record<string, unknown>): void;

  /**
   * Emit the "Request started" event.
   */
  abstract startRequest(context: RequestContext): void;

  /**
   * Emit the terminal event (completed, failed or canceled) for a request.
   */
  abstract finalize(context: RequestContext, completion: RequestCompletion): void;

  abstract log(level: LogLevel, event: string, fields?: LogFields): void;
}
