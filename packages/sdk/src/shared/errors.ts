import type { EntityKind, MetadataPartition, MetaguardError } from "@metaguard/contracts";

/**
 * Creates a standardized validation error for SDK input payloads.
 */
export const createValidationError = (details: string): MetaguardError => ({
  code: "sdk.validation_failed",
  message: "The provided payload failed validation.",
  details: {
    issues: details,
  },
});

/**
 * Returned both for missing entities and for entities whose existence is hidden from the requester.
 */
export const createNotFoundError = (kind: EntityKind): MetaguardError => ({
  code: "metadata.not_found",
  message: `${kind} was not found.`,
  details: { kind },
});

export const createPermissionDeniedError = (
  kind: EntityKind,
  partition: MetadataPartition,
  reason: string,
): MetaguardError => ({
  code: "metadata.permission_denied",
  message: "You do not have permission to perform this action.",
  details: { kind, partition, reason },
});
