import { err, ok } from "@metaguard/contracts";
import type {
  LookupChannel,
  MetadataEntity,
  MetadataPartition,
  MetadataPolicyInput,
  MetadataPolicyPort,
  MetaguardError,
  PolicyDecision,
  Requester,
  ResourceClass,
  Result,
} from "@metaguard/contracts";

import { DEFAULT_POLICY_TABLE } from "./default-policy.js";
import type { MetadataPolicyEngineOptions, MetadataPolicyRule, PolicyTable } from "./types.js";

export class UnmappedEntityError extends Error {
  constructor(readonly resourceClass: string) {
    super(`Resource class ${resourceClass} has no metadata policy rule.`);
    this.name = "UnmappedEntityError";
  }
}

export interface EvaluationOptions {
  readonly lookup?: LookupChannel;
  readonly table?: PolicyTable;
}

interface Principal {
  readonly kind: "user" | "app";
  readonly id: string;
}

export const resolveResourceClass = (entity: MetadataEntity): ResourceClass => {
  switch (entity.kind) {
    case "user":
      return entity.isStaff ? "staff" : "customer";
    case "order":
      return entity.status === "draft" ? "draft_order" : "order";
    default:
      return entity.kind;
  }
};

const ownerOf = (entity: MetadataEntity): Principal | undefined => {
  switch (entity.kind) {
    case "user":
      return { kind: "user", id: entity.id };
    case "app":
      return { kind: "app", id: entity.id };
    case "checkout":
    case "order":
    case "fulfillment":
      return entity.ownerId ? { kind: "user", id: entity.ownerId } : undefined;
    default:
      return undefined;
  }
};

const principalOf = (requester: Requester): Principal | undefined => {
  switch (requester.kind) {
    case "anonymous":
      return undefined;
    case "app":
      return { kind: "app", id: requester.appId };
    default:
      return { kind: "user", id: requester.userId };
  }
};

export const isOwner = (requester: Requester, entity: MetadataEntity): boolean => {
  const owner = ownerOf(entity);
  const principal = principalOf(requester);
  if (!owner || !principal) {
    return false;
  }
  return owner.kind === principal.kind && owner.id === principal.id;
};

const lookupRule = (table: PolicyTable, entity: MetadataEntity): MetadataPolicyRule => {
  const resourceClass = resolveResourceClass(entity);
  const rule = table.get(resourceClass);
  if (!rule) {
    throw new UnmappedEntityError(resourceClass);
  }
  return rule;
};

const allow = (reason: string): PolicyDecision => ({ allow: true, reason });
const deny = (reason: string): PolicyDecision => ({ allow: false, reason });

const CONCEALED_DECISION: PolicyDecision = {
  allow: false,
  reason: "metadata.entity.concealed",
  conceal: true,
};

const checkManagingPermission = (requester: Requester, rule: MetadataPolicyRule): PolicyDecision => {
  if (requester.kind === "anonymous") {
    return deny("metadata.anonymous.denied");
  }
  if (!requester.permissions.includes(rule.permission)) {
    return deny("metadata.permission.missing");
  }
  if (!rule.requesterKinds.includes(requester.kind)) {
    return deny("metadata.requester.kind_not_allowed");
  }
  return allow("metadata.permission.granted");
};

const concealedBy = (requester: Requester, entity: MetadataEntity, rule: MetadataPolicyRule): boolean => {
  if (!rule.concealFromStrangers || !ownerOf(entity)) {
    return false;
  }
  if (isOwner(requester, entity)) {
    return false;
  }
  return !checkManagingPermission(requester, rule).allow;
};

/**
 * Whether the entity must be reported as missing to this requester rather than forbidden.
 */
export const isConcealed = (
  requester: Requester,
  entity: MetadataEntity,
  options: EvaluationOptions = {},
): boolean => concealedBy(requester, entity, lookupRule(options.table ?? DEFAULT_POLICY_TABLE, entity));

/**
 * Decides whether `requester` may read the given metadata partition of `entity`.
 *
 * Private metadata is only ever visible to holders of the class's managing permission;
 * ownership and token lookups widen access to public metadata alone.
 *
 * @throws UnmappedEntityError when the table has no rule for the entity's resource class.
 */
export const canView = (
  requester: Requester,
  entity: MetadataEntity,
  partition: MetadataPartition,
  options: EvaluationOptions = {},
): PolicyDecision => {
  const rule = lookupRule(options.table ?? DEFAULT_POLICY_TABLE, entity);

  if (concealedBy(requester, entity, rule)) {
    return CONCEALED_DECISION;
  }

  if (partition === "private") {
    return checkManagingPermission(requester, rule);
  }

  if (rule.publicAccess === "everyone") {
    return allow("metadata.public.everyone");
  }
  if (rule.publicAccess === "owner" && isOwner(requester, entity)) {
    return allow("metadata.public.owner");
  }
  if (options.lookup === "token" && rule.tokenGrantsPublic) {
    return allow("metadata.public.token");
  }
  return checkManagingPermission(requester, rule);
};

/**
 * Decides whether `requester` may write either metadata partition of `entity`.
 */
export const canManage = (
  requester: Requester,
  entity: MetadataEntity,
  options: EvaluationOptions = {},
): PolicyDecision => {
  const rule = lookupRule(options.table ?? DEFAULT_POLICY_TABLE, entity);
  if (concealedBy(requester, entity, rule)) {
    return CONCEALED_DECISION;
  }
  return checkManagingPermission(requester, rule);
};

export class MetadataPolicyEngine implements MetadataPolicyPort {
  private readonly table: PolicyTable;

  constructor(options: MetadataPolicyEngineOptions = {}) {
    this.table = options.table ?? DEFAULT_POLICY_TABLE;
  }

  get policyTable(): PolicyTable {
    return this.table;
  }

  canView(
    requester: Requester,
    entity: MetadataEntity,
    partition: MetadataPartition,
    lookup?: LookupChannel,
  ): PolicyDecision {
    return canView(requester, entity, partition, { lookup, table: this.table });
  }

  canManage(requester: Requester, entity: MetadataEntity): PolicyDecision {
    return canManage(requester, entity, { table: this.table });
  }

  isConcealed(requester: Requester, entity: MetadataEntity): boolean {
    return isConcealed(requester, entity, { table: this.table });
  }

  async evaluate(input: MetadataPolicyInput): Promise<Result<PolicyDecision, MetaguardError>> {
    try {
      const decision =
        input.mode === "write"
          ? this.canManage(input.requester, input.entity)
          : this.canView(input.requester, input.entity, input.partition, input.lookup);
      return ok(decision);
    } catch (error) {
      if (error instanceof UnmappedEntityError) {
        return err({
          code: "metadata.unmapped_entity",
          message: error.message,
          details: { resourceClass: error.resourceClass, entityKind: input.entity.kind },
        });
      }
      throw error;
    }
  }
}

export const createMetadataPolicyEngine = (
  options: MetadataPolicyEngineOptions = {},
): MetadataPolicyEngine => new MetadataPolicyEngine(options);
