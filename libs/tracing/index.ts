export { TracingModule } from "./tracing.module";
export * from "./core/domain";
export { TracingUseCase } from "./core/ports/in/tracing.use-case";
export { TracingService } from "./service/tracing.service";
export {
  TRACER_PROVIDER,
  createTracerProvider,
} from "./infrastructure/otel/tracer-provider.factory";
