import type { Attributes, Span, SpanKind } from "@opentelemetry/api";
import type { IncomingHttpHeaders } from "http";
import { SpanResult } from "@tracing/core/domain";

/**
 * TracingUseCase - Inbound port for span lifecycle.
 * Every method is a no-op (or returns undefined) while tracing is disabled.
 */
export abstract class TracingUseCase {
  abstract readonly enabled: boolean;

  /**
   * Start the server span of a request, continuing an inbound W3C
   * `traceparent` when one is present.
   */
  abstract startRequestSpan(
    name: string,
    headers: IncomingHttpHeaders,
    attributes?: Attributes,
  ): Span | undefined;

  /**
   * Start a span parented on the active span (task, then request).
   */
  abstract startChildSpan(
    name: string,
    attributes?: Attributes,
    kind?: SpanKind,
  ): Span | undefined;

  abstract endSpan(span: Span | undefined, result?: SpanResult): void;

  abstract getActiveSpan(): Span | undefined;

  /**
   * Make `span` the parent of child spans started while `fn` runs.
   */
  abstract withActiveSpan<T>(span: Span | undefined, fn: () => T): T;
}
