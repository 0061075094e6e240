export { ObservabilityModule } from "./observability.module";
export { configureHttpPipeline } from "./presentation/http-pipeline";
export { ErrorClassifier } from "./presentation/normalizers/error.classifier";
export { ObservabilityExceptionFilter } from "./presentation/observability-exception.filter";
export { RequestBodyErrorHandler } from "./presentation/request-body-error.handler";
export {
  RequestObservabilityMiddleware,
  REQUEST_ID_HEADER,
} from "./presentation/request-observability.middleware";
export { TaskInstrumentation } from "./service/task-instrumentation.service";
