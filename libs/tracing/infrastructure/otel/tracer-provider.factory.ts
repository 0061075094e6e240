import { Resource } from "@opentelemetry/resources";
import {
  BasicTracerProvider,
  BatchSpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig, ServiceConfig } from "@config/index";
import { SpanAttribute } from "@tracing/core/domain";

export const TRACER_PROVIDER = Symbol("TRACER_PROVIDER");

/**
 * Build the provider spans are created from.
 *
 * Enabled: spans are batched and exported over OTLP/HTTP. Disabled: an empty
 * provider, which the tracing service never starts spans from.
 * The provider is not registered globally; the tracing service is the only
 * way spans are created.
 */
export function createTracerProvider(
  service: ServiceConfig,
  observability: ObservabilityConfig,
): BasicTracerProvider {
  if (!observability.tracingEnabled) {
    return new BasicTracerProvider();
  }

  return new NodeTracerProvider({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: service.name,
      [ATTR_SERVICE_VERSION]: service.version,
      [SpanAttribute.DEPLOYMENT_ENVIRONMENT]: service.environment,
    }),
    spanProcessors: [
      new BatchSpanProcessor(
        new OTLPTraceExporter({ url: observability.traceCollectorEndpoint }),
      ),
    ],
  });
}
