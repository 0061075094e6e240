export { MetricsModule } from "./metrics.module";
export * from "./core/domain";
export {
  MetricsUseCase,
  RequestSample,
} from "./core/ports/in/metrics.use-case";
export { MetricsService } from "./service/metrics.service";
