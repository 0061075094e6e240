import { Inject, Injectable, OnModuleDestroy } from "@nestjs/common";
import {
  Attributes,
  defaultTextMapGetter,
  ROOT_CONTEXT,
  Span,
  SpanKind,
  SpanStatusCode,
  trace,
  Tracer,
} from "@opentelemetry/api";
import { W3CTraceContextPropagator } from "@opentelemetry/core";
import { BasicTracerProvider } from "@opentelemetry/sdk-trace-base";
import { AsyncLocalStorage } from "async_hooks";
import type { IncomingHttpHeaders } from "http";
import { observabilityConfig, serviceConfig } from "@config/index";
import type { ObservabilityConfig, ServiceConfig } from "@config/index";
import { ContextService } from "@logging/service/context.service";
import { SpanAttribute, SpanResult } from "@tracing/core/domain";
import { TracingUseCase } from "@tracing/core/ports/in/tracing.use-case";
import { TRACER_PROVIDER } from "@tracing/infrastructure/otel/tracer-provider.factory";

/**
 * TracingService - OpenTelemetry implementation of TracingUseCase.
 *
 * The active span is resolved from this service's own scope (task spans)
 * and then from the request context, so no global OpenTelemetry context
 * manager is needed.
 */
@Injectable()
export class TracingService extends TracingUseCase implements OnModuleDestroy {
  readonly enabled: boolean;
  private readonly tracer: Tracer;
  private readonly propagator = new W3CTraceContextPropagator();
  private readonly activeSpans = new AsyncLocalStorage<Span>();

  constructor(
    @Inject(TRACER_PROVIDER) private readonly provider: BasicTracerProvider,
    @Inject(observabilityConfig.KEY) observability: ObservabilityConfig,
    @Inject(serviceConfig.KEY) service: ServiceConfig,
    private readonly contextService: ContextService,
  ) {
    super();
    this.enabled = observability.tracingEnabled;
    this.tracer = provider.getTracer(service.name, service.version);
  }

  startRequestSpan(
    name: string,
    headers: IncomingHttpHeaders,
    attributes: Attributes = {},
  ): Span | undefined {
    if (!this.enabled) return undefined;

    const parent = this.propagator.extract(
      ROOT_CONTEXT,
      headers,
      defaultTextMapGetter,
    );
    return this.tracer.startSpan(
      name,
      { kind: SpanKind.SERVER, attributes },
      parent,
    );
  }

  startChildSpan(
    name: string,
    attributes: Attributes = {},
    kind: SpanKind = SpanKind.INTERNAL,
  ): Span | undefined {
    if (!this.enabled) return undefined;

    const parentSpan = this.getActiveSpan();
    const parent = parentSpan
      ? trace.setSpan(ROOT_CONTEXT, parentSpan)
      : ROOT_CONTEXT;
    return this.tracer.startSpan(name, { kind, attributes }, parent);
  }

  endSpan(span: Span | undefined, result: SpanResult = {}): void {
    if (!span) return;

    if (result.name) span.updateName(result.name);
    if (result.attributes) span.setAttributes(result.attributes);

    if (result.error !== undefined) {
      span.recordException(
        result.error instanceof Error ? result.error : String(result.error),
      );
      span.setAttribute(SpanAttribute.ERROR_TYPE, errorType(result.error));
    }

    if (result.failed || result.error !== undefined) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: result.errorMessage ?? errorMessage(result.error),
      });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }

    span.end();
  }

  getActiveSpan(): Span | undefined {
    if (!this.enabled) return undefined;
    return (
      this.activeSpans.getStore() ?? this.contextService.getContext()?.span
    );
  }

  withActiveSpan<T>(span: Span | undefined, fn: () => T): T {
    return span ? this.activeSpans.run(span, fn) : fn();
  }

  async onModuleDestroy(): Promise<void> {
    await this.provider.shutdown();
  }
}

function errorType(error: unknown): string {
  return error instanceof Error ? error.constructor.name : typeof error;
}

function errorMessage(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
}
