import type { Attributes } from "@opentelemetry/api";

/**
 * How a span ended. `error` marks the span failed; its message becomes the
 * span status unless `errorMessage` overrides it.
 */
export interface SpanResult {
  /** Final span name, when it is only known at the end (route templates) */
  name?: string;
  attributes?: Attributes;
  error?: unknown;
  errorMessage?: string;
  failed?: boolean;
}
