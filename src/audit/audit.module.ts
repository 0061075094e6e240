import { Module } from "@nestjs/common";
import { AuditRepositoryPort } from "@audit/core/ports/out/audit.repository.port";
import { PgAuditRepository } from "@audit/infrastructure/pg-audit.repository";

@Module({
  providers: [{ provide: AuditRepositoryPort, useClass: PgAuditRepository }],
  exports: [AuditRepositoryPort],
})
export class AuditModule {}
