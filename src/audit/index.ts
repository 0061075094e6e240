export { AuditModule } from "./audit.module";
export * from "./core/domain";
export { AuditRepositoryPort } from "./core/ports/out/audit.repository.port";
export { Origin } from "./presentation/origin.decorator";
