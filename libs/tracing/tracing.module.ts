import { Global, Module } from "@nestjs/common";
import { observabilityConfig, serviceConfig } from "@config/index";
import { TracingUseCase } from "@tracing/core/ports/in/tracing.use-case";
import {
  createTracerProvider,
  TRACER_PROVIDER,
} from "@tracing/infrastructure/otel/tracer-provider.factory";
import { TracingService } from "@tracing/service/tracing.service";

/**
 * TracingModule - tracer provider and span lifecycle.
 * Override TRACER_PROVIDER to capture spans in memory.
 */
@Global()
@Module({
  providers: [
    {
      provide: TRACER_PROVIDER,
      useFactory: createTracerProvider,
      inject: [serviceConfig.KEY, observabilityConfig.KEY],
    },
    TracingService,
    {
      provide: TracingUseCase,
      useExisting: TracingService,
    },
  ],
  exports: [TracingService, TracingUseCase],
})
export class TracingModule {}
