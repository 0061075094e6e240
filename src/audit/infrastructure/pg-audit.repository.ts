import { Injectable } from "@nestjs/common";
import {
  DatabasePort,
  DatabaseSession,
} from "@database/core/ports/out/database.port";
import { AuditEntry } from "@audit/core/domain";
import { AuditRepositoryPort } from "@audit/core/ports/out/audit.repository.port";

// Widths of the audit_logs columns fed from request headers
const USER_AGENT_MAX_LENGTH = 500;
const IP_ADDRESS_MAX_LENGTH = 45;

@Injectable()
export class PgAuditRepository extends AuditRepositoryPort {
  constructor(private readonly database: DatabasePort) {
    super();
  }

  async record(entry: AuditEntry, session?: DatabaseSession): Promise<void> {
    // details is JSONB; free-text details are stored as a JSON string
    await (session ?? this.database).query(
      `INSERT INTO audit_logs
         (user_id, action, resource_type, resource_id, details, ip_address, user_agent)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        entry.userId,
        entry.action,
        entry.resourceType,
        entry.resourceId ?? null,
        entry.details === undefined ? null : JSON.stringify(entry.details),
        clip(entry.ipAddress, IP_ADDRESS_MAX_LENGTH),
        clip(entry.userAgent, USER_AGENT_MAX_LENGTH),
      ],
    );
  }
}

function clip(value: string | undefined, maxLength: number): string | null {
  return value === undefined ? null : value.slice(0, maxLength);
}
