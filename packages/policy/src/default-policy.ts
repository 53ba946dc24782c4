import type { PrivilegedRequesterKind } from "@metaguard/contracts";

import type { MetadataPolicyRule, PolicyTable } from "./types.js";

const STAFF_AND_APPS: ReadonlyArray<PrivilegedRequesterKind> = ["staff", "app"];

const catalogRule = (
  resourceClass: MetadataPolicyRule["resourceClass"],
  publicAccess: MetadataPolicyRule["publicAccess"] = "everyone",
): MetadataPolicyRule => ({
  resourceClass,
  permission: "manage_rooms",
  publicAccess,
  requesterKinds: STAFF_AND_APPS,
  tokenGrantsPublic: false,
  concealFromStrangers: false,
});

export const DEFAULT_POLICY_RULES: ReadonlyArray<MetadataPolicyRule> = [
  {
    resourceClass: "customer",
    permission: "manage_users",
    publicAccess: "owner",
    requesterKinds: STAFF_AND_APPS,
    tokenGrantsPublic: false,
    concealFromStrangers: false,
  },
  {
    resourceClass: "staff",
    permission: "manage_staff",
    publicAccess: "owner",
    // apps never manage staff accounts
    requesterKinds: ["staff"],
    tokenGrantsPublic: false,
    concealFromStrangers: false,
  },
  {
    resourceClass: "checkout",
    permission: "manage_checkouts",
    publicAccess: "owner",
    requesterKinds: STAFF_AND_APPS,
    tokenGrantsPublic: true,
    concealFromStrangers: true,
  },
  {
    resourceClass: "order",
    permission: "manage_orders",
    publicAccess: "owner",
    requesterKinds: STAFF_AND_APPS,
    tokenGrantsPublic: true,
    concealFromStrangers: false,
  },
  {
    resourceClass: "draft_order",
    permission: "manage_orders",
    publicAccess: "owner",
    requesterKinds: STAFF_AND_APPS,
    tokenGrantsPublic: false,
    concealFromStrangers: false,
  },
  {
    resourceClass: "fulfillment",
    permission: "manage_orders",
    publicAccess: "owner",
    requesterKinds: STAFF_AND_APPS,
    tokenGrantsPublic: true,
    concealFromStrangers: false,
  },
  catalogRule("room"),
  catalogRule("room_type"),
  catalogRule("room_variant"),
  catalogRule("category"),
  catalogRule("collection"),
  catalogRule("attribute"),
  catalogRule("page_type"),
  catalogRule("digital_content", "managers"),
  catalogRule("hotel", "managers"),
  {
    resourceClass: "app",
    permission: "manage_apps",
    publicAccess: "owner",
    requesterKinds: STAFF_AND_APPS,
    tokenGrantsPublic: false,
    concealFromStrangers: false,
  },
];

export const createPolicyTable = (rules: ReadonlyArray<MetadataPolicyRule>): PolicyTable =>
  new Map(rules.map((rule) => [rule.resourceClass, rule]));

export const DEFAULT_POLICY_TABLE: PolicyTable = createPolicyTable(DEFAULT_POLICY_RULES);
