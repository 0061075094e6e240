import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import { NextFunction, Request, Response } from "express";
import { randomUUID } from "crypto";
import { performance } from "perf_hooks";
import {
  CLIENT_CLOSED_REQUEST,
  RequestCompletion,
  RequestContext,
  RequestOutcome,
  RouteNormalizer,
} from "@logging/core/domain";
import { ContextService } from "@logging/service/context.service";
import { LoggingService } from "@logging/service/logging.service";
import { SCRAPE_ENDPOINT } from "@metrics/core/domain";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";
import { SpanAttribute } from "@tracing/core/domain";
import { TracingUseCase } from "@tracing/core/ports/in/tracing.use-case";

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * RequestObservabilityMiddleware - wraps every HTTP request exactly once.
 *
 * Responsibilities:
 * - Assign a fresh correlation id and echo it in X-Request-ID
 * - Open the request span (continuing an inbound traceparent)
 * - Run the rest of the pipeline inside the request's context scope
 * - Report the request once, on `finish` (completed / failed) or on
 *   `close` before finish (canceled), to metrics, logs and the span
 *
 * Mounted ahead of CORS and the body parsers (see configureHttpPipeline) so
 * that preflights, rejected bodies, guard rejections and unmatched routes are
 * reported too.
 */
@Injectable()
export class RequestObservabilityMiddleware implements NestMiddleware {
  private readonly logger = new Logger(RequestObservabilityMiddleware.name);

  constructor(
    private readonly loggingService: LoggingService,
    private readonly contextService: ContextService,
    private readonly metrics: MetricsUseCase,
    private readonly tracing: TracingUseCase,
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const path = RouteNormalizer.stripQueryString(req.originalUrl || req.url);
    // An inbound id is kept for correlation with the caller, never reused
    const context = this.loggingService.initializeContext({
      requestId: randomUUID(),
      method: req.method,
      path,
      clientAddress: req.ip ?? req.socket.remoteAddress ?? "unknown",
      userAgent: req.get("user-agent") ?? "",
      requestSize: contentLength(req.headers["content-length"]),
      upstreamRequestId: firstHeader(req.headers[REQUEST_ID_HEADER]),
    });

    res.setHeader("X-Request-ID", context.requestId);
    this.contextService.attach(req, context);

    this.safely("span start", () => {
      context.span = this.tracing.startRequestSpan(req.method, req.headers, {
        [SpanAttribute.HTTP_METHOD]: req.method,
        [SpanAttribute.URL_PATH]: path,
        [SpanAttribute.CLIENT_ADDRESS]: context.clientAddress,
        [SpanAttribute.USER_AGENT]: context.userAgent,
        [SpanAttribute.REQUEST_ID]: context.requestId,
      });
    });
    this.safely("in-flight gauge", () => this.metrics.trackInFlight(1));
    this.safely("start event", () => this.loggingService.startRequest(context));

    res.once("finish", () => {
      this.finalize(
        req,
        res,
        context,
        context.failure ? RequestOutcome.FAILED : RequestOutcome.COMPLETED,
      );
    });
    res.once("close", () => {
      if (!res.writableFinished) {
        this.finalize(req, res, context, RequestOutcome.CANCELED);
      }
    });

    this.contextService.run(context, () => next());
  }

  /**
   * Re-enters the request's context scope. Body parsers continue the chain
   * from stream callbacks, which run outside the scope opened by `use`.
   */
  resume(req: Request, _res: Response, next: NextFunction): void {
    const context = this.contextService.getContext(req);
    if (!context) {
      next();
      return;
    }
    this.contextService.run(context, () => next());
  }

  private finalize(
    req: Request,
    res: Response,
    context: RequestContext,
    outcome: RequestOutcome,
  ): void {
    if (context.finalized) return;
    context.finalized = true;

    const completion: RequestCompletion = {
      outcome,
      statusCode:
        outcome === RequestOutcome.CANCELED
          ? CLIENT_CLOSED_REQUEST
          : res.statusCode,
      endpoint: RouteNormalizer.endpoint(req),
      durationMs: performance.now() - context.startTime,
      responseSize: contentLength(res.getHeader("content-length")),
    };

    this.safely("request metrics", () => {
      if (!this.metrics.enabled || completion.endpoint === SCRAPE_ENDPOINT) {
        return;
      }
      this.metrics.recordRequest({
        method: context.method,
        endpoint: completion.endpoint,
        statusCode: completion.statusCode,
        durationSeconds: completion.durationMs / 1000,
        requestSize: context.requestSize,
        responseSize: completion.responseSize,
      });
      if (completion.statusCode >= 500) {
        this.metrics.recordDomainEvent("error", {
          error_type: "request_error",
          service: "middleware",
        });
      }
    });
    this.safely("in-flight gauge", () => this.metrics.trackInFlight(-1));
    this.safely("terminal event", () =>
      this.loggingService.finalize(context, completion),
    );
    this.safely("span end", () => this.endSpan(context, completion));
  }

  private endSpan(context: RequestContext, completion: RequestCompletion): void {
    const attributes = {
      [SpanAttribute.HTTP_ROUTE]: completion.endpoint,
      [SpanAttribute.HTTP_STATUS_CODE]: completion.statusCode,
      [SpanAttribute.REQUEST_OUTCOME]: completion.outcome,
    };
    const name = `${context.method} ${completion.endpoint}`;

    switch (completion.outcome) {
      case RequestOutcome.COMPLETED:
        this.tracing.endSpan(context.span, { name, attributes });
        return;
      case RequestOutcome.CANCELED:
        this.tracing.endSpan(context.span, {
          name,
          attributes,
          failed: true,
          errorMessage: "request canceled",
        });
        return;
      case RequestOutcome.FAILED:
        this.tracing.endSpan(context.span, {
          name,
          attributes,
          error: context.exception,
          failed: true,
          errorMessage: context.failure?.message,
        });
        return;
    }
  }

  /**
   * Bookkeeping failures are logged and swallowed; the remaining steps still
   * run and the response is never affected.
   */
  private safely(step: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.error(
        `Request observability step failed: ${step}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  return header && header.length > 0 ? header : undefined;
}

function contentLength(value: number | string | string[] | undefined): number {
  const raw = Array.isArray(value) ? value[0] : value;
  const parsed = typeof raw === "number" ? raw : Number.parseInt(raw ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}
