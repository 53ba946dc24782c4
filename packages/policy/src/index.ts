export {
  MetadataPolicyEngine,
  UnmappedEntityError,
  canManage,
  canView,
  createMetadataPolicyEngine,
  isConcealed,
  isOwner,
  resolveResourceClass,
} from "./metadata-policy-engine.js";
export type { EvaluationOptions } from "./metadata-policy-engine.js";
export { DEFAULT_POLICY_RULES, DEFAULT_POLICY_TABLE, createPolicyTable } from "./default-policy.js";
export {
  PolicyConfigurationError,
  loadPolicyOverrides,
  loadPolicyTable,
  parsePolicyOverrides,
  resolvePolicyTable,
} from "./policy-config.js";
export { readStructuredFile } from "./structured-file.js";
export type {
  MetadataPolicyEngineOptions,
  MetadataPolicyRule,
  MetadataPolicyRuleInput,
  PolicyTable,
  PublicAccess,
} from "./types.js";
