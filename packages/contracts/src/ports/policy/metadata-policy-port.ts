import type { MetaguardError } from "../../types/domain-error.js";
import type { LookupChannel, MetadataEntity, MetadataPartition } from "../../types/metadata.js";
import type { Requester } from "../../types/requester.js";
import type { Result } from "../../types/result.js";

export type MetadataAccessMode = "read" | "write";

export interface MetadataPolicyInput {
  readonly requester: Requester;
  readonly entity: MetadataEntity;
  readonly partition: MetadataPartition;
  readonly mode?: MetadataAccessMode;
  readonly lookup?: LookupChannel;
}

export interface PolicyDecision {
  readonly allow: boolean;
  readonly reason: string;
  /**
   * Set when the entity must be reported as missing instead of forbidden.
   */
  readonly conceal?: boolean;
}

export interface MetadataPolicyPort {
  evaluate(input: MetadataPolicyInput): Promise<Result<PolicyDecision, MetaguardError>>;
}
