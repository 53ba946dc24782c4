export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/requester.js";
export * from "./types/metadata.js";
export * from "./types/audit.js";

export * from "./ports/policy/metadata-policy-port.js";
export * from "./ports/entities/entity-store-port.js";
export * from "./ports/audit/audit-log-port.js";
