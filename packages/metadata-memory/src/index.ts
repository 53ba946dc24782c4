export { InMemoryEntityStore, createInMemoryEntityStore } from "./memory-entity-store.js";
export type { InMemoryEntityStoreOptions } from "./memory-entity-store.js";
export { MemoryAuditLog, createMemoryAuditLog } from "./memory-audit-log.js";
export type { MemoryAuditLogOptions } from "./memory-audit-log.js";
export { LegacyMetadataError, flattenLegacyMetadata, upgradeLegacyRecord } from "./legacy.js";
export type { LegacyMetadata, LegacyMetadataRecord } from "./legacy.js";
