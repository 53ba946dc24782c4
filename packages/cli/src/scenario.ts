import { z } from "zod";

import {
  CATALOG_ENTITY_KINDS,
  ORDER_STATUSES,
  type LookupChannel,
  type MetadataAccessMode,
  type MetadataEntity,
  type MetadataPartition,
  type Requester,
  type ResourceClass,
} from "@metaguard/contracts";
import { readStructuredFile, resolveResourceClass, type MetadataPolicyEngine } from "@metaguard/policy";
import { partitionSchema, requesterSchema } from "@metaguard/sdk";

export class ScenarioError extends Error {
  constructor(
    message: string,
    readonly issues: ReadonlyArray<string> = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ScenarioError";
  }
}

const nonEmpty = z.string().min(1);
const metadataMapSchema = z.record(z.string()).default({});

const entityFields = {
  id: nonEmpty,
  metadata: metadataMapSchema,
  privateMetadata: metadataMapSchema,
};

const entitySchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("user"),
      ...entityFields,
      email: z.string().default(""),
      isStaff: z.boolean().default(false),
    })
    .strict(),
  z.object({ kind: z.literal("checkout"), ...entityFields, token: nonEmpty, ownerId: nonEmpty.optional() }).strict(),
  z
    .object({
      kind: z.literal("order"),
      ...entityFields,
      token: nonEmpty,
      status: z.enum(ORDER_STATUSES).default("unfulfilled"),
      ownerId: nonEmpty.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("fulfillment"),
      ...entityFields,
      orderId: nonEmpty,
      orderToken: nonEmpty,
      ownerId: nonEmpty.optional(),
    })
    .strict(),
  z.object({ kind: z.literal("app"), ...entityFields, name: z.string().default("") }).strict(),
  z.object({ kind: z.enum(CATALOG_ENTITY_KINDS), ...entityFields, name: z.string().optional() }).strict(),
]);

const scenarioCaseSchema = z
  .object({
    name: nonEmpty,
    requester: requesterSchema,
    entity: entitySchema,
    partition: partitionSchema.default("public"),
    mode: z.enum(["read", "write"]).default("read"),
    lookup: z.enum(["id", "token"]).default("id"),
    expect: z.object({ allow: z.boolean(), reason: nonEmpty.optional() }).strict().optional(),
  })
  .strict();

const scenarioSchema = z.object({ cases: z.array(scenarioCaseSchema).min(1) }).strict();

export interface ScenarioCase {
  readonly name: string;
  readonly requester: Requester;
  readonly entity: MetadataEntity;
  readonly partition: MetadataPartition;
  readonly mode: MetadataAccessMode;
  readonly lookup: LookupChannel;
  readonly expect?: { readonly allow: boolean; readonly reason?: string };
}

export interface Scenario {
  readonly cases: ReadonlyArray<ScenarioCase>;
}

export interface ScenarioCaseReport {
  readonly name: string;
  readonly resourceClass: ResourceClass;
  readonly allow: boolean;
  readonly reason: string;
  readonly conceal: boolean;
  /**
   * Present only when the case declares an expectation.
   */
  readonly matches?: boolean;
}

export interface ScenarioReport {
  readonly cases: ReadonlyArray<ScenarioCaseReport>;
  readonly failed: number;
}

export const parseScenario = (input: unknown): Scenario => {
  const parsed = scenarioSchema.safeParse(input);
  if (!parsed.success) {
    throw new ScenarioError(
      "Invalid scenario",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
};

export const loadScenario = async (filePath: string): Promise<Scenario> =>
  parseScenario(await readStructuredFile(filePath));

const evaluateCase = (scenarioCase: ScenarioCase, engine: MetadataPolicyEngine): ScenarioCaseReport => {
  const { requester, entity, partition, lookup, expect } = scenarioCase;
  const decision =
    scenarioCase.mode === "write"
      ? engine.canManage(requester, entity)
      : engine.canView(requester, entity, partition, lookup);

  const report: ScenarioCaseReport = {
    name: scenarioCase.name,
    resourceClass: resolveResourceClass(entity),
    allow: decision.allow,
    reason: decision.reason,
    conceal: decision.conceal ?? false,
  };
  if (!expect) {
    return report;
  }
  const matches = expect.allow === decision.allow && (expect.reason ?? decision.reason) === decision.reason;
  return { ...report, matches };
};

/**
 * Runs every case through the policy engine and counts cases whose expectation was not met.
 */
export const evaluateScenario = (scenario: Scenario, engine: MetadataPolicyEngine): ScenarioReport => {
  const cases = scenario.cases.map((scenarioCase) => evaluateCase(scenarioCase, engine));
  return { cases, failed: cases.filter((report) => report.matches === false).length };
};
