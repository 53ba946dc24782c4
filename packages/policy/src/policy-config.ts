import { z } from "zod";

import { PERMISSIONS, RESOURCE_CLASSES } from "@metaguard/contracts";

import { DEFAULT_POLICY_TABLE } from "./default-policy.js";
import { readStructuredFile } from "./structured-file.js";
import type { MetadataPolicyRule, MetadataPolicyRuleInput, PolicyTable } from "./types.js";

export class PolicyConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: ReadonlyArray<string> = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "PolicyConfigurationError";
  }
}

const ruleOverrideSchema = z
  .object({
    resourceClass: z.enum(RESOURCE_CLASSES),
    permission: z.enum(PERMISSIONS).optional(),
    publicAccess: z.enum(["everyone", "owner", "managers"]).optional(),
    requesterKinds: z.array(z.enum(["customer", "staff", "app"])).optional(),
    tokenGrantsPublic: z.boolean().optional(),
    concealFromStrangers: z.boolean().optional(),
  })
  .strict();

const policyFileSchema = z
  .object({
    rules: z.array(ruleOverrideSchema).default([]),
  })
  .strict();

const formatIssues = (error: z.ZodError): ReadonlyArray<string> =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );

/**
 * Validates raw policy override data, e.g. a parsed YAML document.
 */
export const parsePolicyOverrides = (input: unknown): ReadonlyArray<MetadataPolicyRuleInput> => {
  const parsed = policyFileSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new PolicyConfigurationError("Invalid metadata policy configuration", formatIssues(parsed.error));
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const rule of parsed.data.rules) {
    if (seen.has(rule.resourceClass)) {
      duplicates.push(`rules: ${rule.resourceClass} is declared more than once`);
    }
    seen.add(rule.resourceClass);
  }
  if (duplicates.length > 0) {
    throw new PolicyConfigurationError("Invalid metadata policy configuration", duplicates);
  }

  return parsed.data.rules;
};

export const loadPolicyOverrides = async (
  filePath: string,
): Promise<ReadonlyArray<MetadataPolicyRuleInput>> =>
  parsePolicyOverrides(await readStructuredFile(filePath));

const mergeRule = (current: MetadataPolicyRule, override: MetadataPolicyRuleInput): MetadataPolicyRule => ({
  resourceClass: current.resourceClass,
  permission: override.permission ?? current.permission,
  publicAccess: override.publicAccess ?? current.publicAccess,
  requesterKinds: override.requesterKinds ?? current.requesterKinds,
  tokenGrantsPublic: override.tokenGrantsPublic ?? current.tokenGrantsPublic,
  concealFromStrangers: override.concealFromStrangers ?? current.concealFromStrangers,
});

const buildRule = (override: MetadataPolicyRuleInput): MetadataPolicyRule => {
  if (!override.permission || !override.publicAccess) {
    throw new PolicyConfigurationError(
      `Rule for ${override.resourceClass} must declare permission and publicAccess`,
    );
  }
  return {
    resourceClass: override.resourceClass,
    permission: override.permission,
    publicAccess: override.publicAccess,
    requesterKinds: override.requesterKinds ?? ["staff", "app"],
    tokenGrantsPublic: override.tokenGrantsPublic ?? false,
    concealFromStrangers: override.concealFromStrangers ?? false,
  };
};

/**
 * Merges rule overrides over a base table. Fields left out of an override keep the base value;
 * a class missing from the base needs a complete rule.
 */
export const resolvePolicyTable = (
  overrides: ReadonlyArray<MetadataPolicyRuleInput>,
  base: PolicyTable = DEFAULT_POLICY_TABLE,
): PolicyTable => {
  const table = new Map(base);
  for (const override of overrides) {
    const current = table.get(override.resourceClass);
    table.set(override.resourceClass, current ? mergeRule(current, override) : buildRule(override));
  }
  return table;
};

export const loadPolicyTable = async (filePath?: string): Promise<PolicyTable> => {
  if (!filePath) {
    return DEFAULT_POLICY_TABLE;
  }
  return resolvePolicyTable(await loadPolicyOverrides(filePath));
};
