import {
  describeRequester,
  err,
  lookupChannelOf,
  ok,
  type AuditOutcome,
  type EntityReference,
  type MetadataAccessMode,
  type MetadataEntity,
  type MetadataPartition,
  type MetaguardError,
  type Requester,
  type Result,
} from "@metaguard/contracts";

import type { MetaguardSdkContext } from "../context.js";
import { createNotFoundError, createPermissionDeniedError } from "./errors.js";

export interface AccessRequest {
  readonly requester: Requester;
  readonly reference: EntityReference;
  readonly partition: MetadataPartition;
  readonly mode: MetadataAccessMode;
}

const recordAudit = async (
  context: MetaguardSdkContext,
  request: AccessRequest,
  entity: MetadataEntity,
  outcome: AuditOutcome,
  reason: string,
): Promise<void> => {
  const auditLog = context.deps.auditLog;
  if (!auditLog) {
    return;
  }
  const result = await auditLog.appendEvent({
    category: "metadata",
    action: `metadata.${request.mode}.${request.partition}`,
    outcome,
    actor: describeRequester(request.requester),
    resource: { type: entity.kind, id: entity.id },
    metadata: { reason, lookup: lookupChannelOf(request.reference) },
  });
  if (!result.ok) {
    context.logger.warn("sdk.audit.append_failed", { code: result.error.code, message: result.error.message });
  }
};

/**
 * Fetches the referenced entity and checks it against the metadata policy. Concealed entities
 * fail exactly like missing ones.
 */
export const authorizeAccess = async (
  context: MetaguardSdkContext,
  request: AccessRequest,
): Promise<Result<MetadataEntity, MetaguardError>> => {
  const { reference, requester, partition, mode } = request;
  const entity = await context.deps.entityStore.findEntity(reference);
  if (!entity) {
    return err(createNotFoundError(reference.kind));
  }

  const decision = await context.deps.policy.evaluate({
    requester,
    entity,
    partition,
    mode,
    lookup: lookupChannelOf(reference),
  });
  if (!decision.ok) {
    return decision;
  }

  if (decision.value.conceal) {
    await recordAudit(context, request, entity, "concealed", decision.value.reason);
    return err(createNotFoundError(reference.kind));
  }
  if (!decision.value.allow) {
    await recordAudit(context, request, entity, "denied", decision.value.reason);
    return err(createPermissionDeniedError(reference.kind, partition, decision.value.reason));
  }
  if (mode === "write") {
    await recordAudit(context, request, entity, "allowed", decision.value.reason);
  }
  return ok(entity);
};
