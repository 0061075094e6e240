import type { DatabaseSession } from "@database/core/ports/out/database.port";
import { AuditEntry } from "@audit/core/domain";

/**
 * AuditRepositoryPort - append-only audit trail.
 * Pass the session of the transaction the audited change runs in.
 */
export abstract class AuditRepositoryPort {
  abstract record(entry: AuditEntry, session?: DatabaseSession): Promise<void>;
}
