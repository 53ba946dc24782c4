import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

import { DEFAULT_POLICY_TABLE, createMetadataPolicyEngine, resolvePolicyTable } from "@metaguard/policy";

import {
  MetaguardConfigError,
  ScenarioError,
  describePolicyTable,
  evaluateScenario,
  flattenLegacyFile,
  formatOutput,
  loadMetaguardConfig,
  loadScenario,
  parseScenario,
} from "../src/index.js";

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("loadMetaguardConfig", () => {
  it("defaults to the built-in table at info level", () => {
    expect(loadMetaguardConfig({})).toEqual({ logLevel: "info" });
  });

  it("normalizes the environment", () => {
    expect(
      loadMetaguardConfig({ METAGUARD_POLICY_FILE: " policy.yaml ", METAGUARD_LOG_LEVEL: "DEBUG" }),
    ).toEqual({ policyFile: "policy.yaml", logLevel: "debug" });
  });

  it("rejects unknown log levels", () => {
    expect(() => loadMetaguardConfig({ METAGUARD_LOG_LEVEL: "verbose" })).toThrow(MetaguardConfigError);
    expect(() => loadMetaguardConfig({ METAGUARD_LOG_LEVEL: "verbose" })).toThrow(
      "Invalid metaguard environment: METAGUARD_LOG_LEVEL: Expected one of debug, info, warn, error",
    );
  });
});

describe("scenarios", () => {
  it("evaluates each case and counts unmet expectations", async () => {
    const scenario = await loadScenario(fixture("checkout-scenario.yaml"));

    const report = evaluateScenario(scenario, createMetadataPolicyEngine());

    expect(report).toEqual({
      failed: 1,
      cases: [
        {
          name: "stranger looks up an owned checkout by token",
          resourceClass: "checkout",
          allow: false,
          reason: "metadata.entity.concealed",
          conceal: true,
          matches: true,
        },
        {
          name: "owner reads their checkout",
          resourceClass: "checkout",
          allow: true,
          reason: "metadata.public.owner",
          conceal: false,
          matches: true,
        },
        {
          name: "app writes hotel metadata",
          resourceClass: "hotel",
          allow: true,
          reason: "metadata.permission.granted",
          conceal: false,
          matches: true,
        },
        {
          name: "staff member reads own private metadata",
          resourceClass: "staff",
          allow: false,
          reason: "metadata.permission.missing",
          conceal: false,
          matches: false,
        },
      ],
    });
  });

  it("fills in defaults and omits matches without an expectation", () => {
    const scenario = parseScenario({
      cases: [{ name: "anyone reads a room", requester: { kind: "anonymous" }, entity: { kind: "room", id: "room-1" } }],
    });

    expect(scenario.cases[0]).toEqual({
      name: "anyone reads a room",
      requester: { kind: "anonymous" },
      entity: { kind: "room", id: "room-1", metadata: {}, privateMetadata: {} },
      partition: "public",
      mode: "read",
      lookup: "id",
    });
    expect(evaluateScenario(scenario, createMetadataPolicyEngine()).cases).toEqual([
      {
        name: "anyone reads a room",
        resourceClass: "room",
        allow: true,
        reason: "metadata.public.everyone",
        conceal: false,
      },
    ]);
  });

  it("applies the engine's table", () => {
    const scenario = parseScenario({
      cases: [{ name: "anyone reads a hotel", requester: { kind: "anonymous" }, entity: { kind: "hotel", id: "hotel-1" } }],
    });
    const engine = createMetadataPolicyEngine({
      table: resolvePolicyTable([{ resourceClass: "hotel", publicAccess: "everyone" }]),
    });

    expect(evaluateScenario(scenario, engine).cases[0]?.allow).toBe(true);
  });

  it("rejects an empty scenario", () => {
    expect(() => parseScenario({ cases: [] })).toThrow(ScenarioError);
    expect(() => parseScenario({ cases: [] })).toThrow(
      "Invalid scenario: cases: Array must contain at least 1 element(s)",
    );
  });
});

describe("describePolicyTable", () => {
  it("lists rules in resource class order", () => {
    const rows = describePolicyTable(DEFAULT_POLICY_TABLE);

    expect(rows).toHaveLength(16);
    expect(rows[0]).toEqual({
      resourceClass: "customer",
      permission: "manage_users",
      publicAccess: "owner",
      requesterKinds: ["staff", "app"],
      tokenGrantsPublic: false,
      concealFromStrangers: false,
    });
    expect(rows.map((row) => row.resourceClass).slice(0, 3)).toEqual(["customer", "staff", "checkout"]);
  });
});

describe("formatOutput", () => {
  it("renders json and yaml", () => {
    expect(formatOutput({ allow: true }, "json")).toBe('{\n  "allow": true\n}');
    expect(formatOutput({ allow: true }, "yaml")).toBe("allow: true\n");
  });
});

describe("flattenLegacyFile", () => {
  it("flattens both partitions into sorted items", async () => {
    await expect(flattenLegacyFile(fixture("legacy-record.json"))).resolves.toEqual({
      metadata: [
        { key: "channel-sync.external_id", value: "A-1" },
        { key: "channel-sync.retries", value: "3" },
      ],
      privateMetadata: [
        { key: "billing.account", value: "acct-9" },
        { key: "billing.tier", value: "gold" },
      ],
    });
  });

  it("fails on keys that collide once namespaces are dropped", async () => {
    await expect(flattenLegacyFile(fixture("legacy-duplicate.yaml"))).rejects.toThrow(
      "Meta key billing.tier is duplicated.",
    );
  });
});
