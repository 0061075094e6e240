import { Global, Module } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";
import { ObservabilityExceptionFilter } from "@observability/presentation/observability-exception.filter";
import { RequestBodyErrorHandler } from "@observability/presentation/request-body-error.handler";
import { RequestObservabilityMiddleware } from "@observability/presentation/request-observability.middleware";
import { TaskInstrumentation } from "@observability/service/task-instrumentation.service";

/**
 * ObservabilityModule - provides the request middleware and body error
 * handler that configureHttpPipeline mounts, and installs the global
 * exception filter.
 *
 * Relies on the global LoggingModule, MetricsModule and TracingModule.
 */
@Global()
@Module({
  providers: [
    RequestObservabilityMiddleware,
    RequestBodyErrorHandler,
    TaskInstrumentation,
    {
      provide: APP_FILTER,
      useClass: ObservabilityExceptionFilter,
    },
  ],
  exports: [TaskInstrumentation],
})
export class ObservabilityModule {}
