import { isSpanContextValid, Span } from "@opentelemetry/api";

/**
 * Failure classification recorded by the exception filter and reported by the
 * request middleware when the request ends.
 */
export interface RequestFailure {
  status: number;
  /** Stable code for grouping (e.g. "NOT_FOUND", "INFRASTRUCTURE_ERROR") */
  code: string;
  message: string;
  category: FailureCategory;
  exceptionName: string;
  validationErrors?: string[];
  stack?: string;
}

export enum FailureCategory {
  CLIENT = "client",
  AUTH = "auth",
  INFRASTRUCTURE = "infrastructure",
  UNEXPECTED = "unexpected",
}

export interface RequestUser {
  id: string;
  role: string;
}

export interface RequestContextInit {
  requestId: string;
  method: string;
  path: string;
  clientAddress: string;
  userAgent: string;
  requestSize: number;
  upstreamRequestId?: string;
}

/**
 * RequestContext - per-request state owned by the request middleware.
 *
 * Created when the request enters, enriched by handlers (user, metadata) and
 * by the exception filter (failure), and reported once when the request ends.
 * It is never shared between requests.
 */
export class RequestContext {
  public readonly requestId: string;
  public readonly timestamp: string;
  /** Monotonic start, from performance.now() */
  public readonly startTime: number;
  public readonly method: string;
  public readonly path: string;
  public readonly clientAddress: string;
  public readonly userAgent: string;
  public readonly requestSize: number;
  public readonly upstreamRequestId?: string;

  public user?: RequestUser;
  public failure?: RequestFailure;
  /** The raw thrown value behind `failure`, kept for span exception events */
  public exception?: unknown;
  public span?: Span;
  public finalized = false;
  public metadata: Record<string, unknown> = {};

  constructor(init: RequestContextInit, startTime: number) {
    this.requestId = init.requestId;
    this.timestamp = new Date().toISOString();
    this.startTime = startTime;
    this.method = init.method;
    this.path = init.path;
    this.clientAddress = init.clientAddress;
    this.userAgent = init.userAgent;
    this.requestSize = init.requestSize;
    this.upstreamRequestId = init.upstreamRequestId;
  }

  enrich(
    updates: Partial<Pick<RequestContext, "user" | "metadata">>,
  ): void {
    if (updates.user !== undefined) this.user = updates.user;
    if (updates.metadata !== undefined) {
      this.metadata = { ...this.metadata, ...updates.metadata };
    }
  }

  recordFailure(failure: RequestFailure, exception: unknown): void {
    this.failure = failure;
    this.exception = exception;
  }

  /**
   * Fields that tie an event to this request and its trace.
   * trace_id / span_id are present only while a sampled span is attached.
   */
  correlationFields(): Record<string, string> {
    const fields: Record<string, string> = { request_id: this.requestId };
    const spanContext = this.span?.spanContext();
    if (spanContext && isSpanContextValid(spanContext)) {
      fields.trace_id = spanContext.traceId;
      fields.span_id = spanContext.spanId;
    }
    return fields;
  }
}
