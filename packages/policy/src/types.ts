import type { Permission, PrivilegedRequesterKind, ResourceClass } from "@metaguard/contracts";

/**
 * Who may read a resource class's public metadata without holding its managing permission.
 *
 * - `everyone`: globally readable, anonymous requesters included.
 * - `owner`: the owning user or app.
 * - `managers`: nobody beyond permission holders.
 */
export type PublicAccess = "everyone" | "owner" | "managers";

export interface MetadataPolicyRule {
  readonly resourceClass: ResourceClass;
  readonly permission: Permission;
  readonly publicAccess: PublicAccess;
  /**
   * Requester kinds that may exercise `permission` on this class. A holder of the
   * permission whose kind is not listed is treated as unprivileged.
   */
  readonly requesterKinds: ReadonlyArray<PrivilegedRequesterKind>;
  /**
   * Looking the entity up by its opaque token is enough to read public metadata.
   */
  readonly tokenGrantsPublic: boolean;
  /**
   * Owned entities are reported as missing to anyone who is neither owner nor manager.
   */
  readonly concealFromStrangers: boolean;
}

export type MetadataPolicyRuleInput = Pick<MetadataPolicyRule, "resourceClass"> &
  Partial<Omit<MetadataPolicyRule, "resourceClass">>;

export type PolicyTable = ReadonlyMap<ResourceClass, MetadataPolicyRule>;

export interface MetadataPolicyEngineOptions {
  readonly table?: PolicyTable;
}
