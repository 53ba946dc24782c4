import type { MetaguardError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { AppendAuditEventInput, AuditEventRecord } from "../../types/audit.js";

export interface AuditLogPort {
  appendEvent(input: AppendAuditEventInput): Promise<Result<AuditEventRecord, MetaguardError>>;
  listEvents(): Promise<Result<ReadonlyArray<AuditEventRecord>, MetaguardError>>;
}
