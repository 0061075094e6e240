export { HealthModule } from "./health.module";
export * from "./core/dtos";
