import { Global, Module } from "@nestjs/common";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";
import { MetricsService } from "@metrics/service/metrics.service";
import { MetricsController } from "@metrics/presentation/metrics.controller";

/**
 * MetricsModule - process-wide metrics registry and its scrape endpoint.
 */
@Global()
@Module({
  controllers: [MetricsController],
  providers: [
    MetricsService,
    {
      provide: MetricsUseCase,
      useExisting: MetricsService,
    },
  ],
  exports: [MetricsService, MetricsUseCase],
})
export class MetricsModule {}
