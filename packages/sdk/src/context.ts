import type { AuditLogPort, EntityStorePort, MetadataPolicyPort } from "@metaguard/contracts";
import type { MetaguardLogger } from "@metaguard/telemetry";

import type { MetaguardSdkTelemetryContext } from "./shared/telemetry.js";

/**
 * Ports the SDK consumes. Each can be satisfied by a different infrastructure adapter.
 */
export interface MetaguardSdkDependencies {
  readonly entityStore: EntityStorePort;
  readonly policy: MetadataPolicyPort;
  readonly auditLog?: AuditLogPort;
}

export interface MetaguardSdkContext {
  readonly deps: MetaguardSdkDependencies;
  readonly telemetry: MetaguardSdkTelemetryContext;
  readonly logger: MetaguardLogger;
}
