import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

import { ANONYMOUS_REQUESTER, type MetadataEntity } from "@metaguard/contracts";

import {
  DEFAULT_POLICY_TABLE,
  PolicyConfigurationError,
  canView,
  loadPolicyOverrides,
  loadPolicyTable,
  parsePolicyOverrides,
  resolvePolicyTable,
} from "../src/index.js";

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const hotel: MetadataEntity = { kind: "hotel", id: "hotel-1", metadata: {}, privateMetadata: {} };

describe("parsePolicyOverrides", () => {
  it("accepts an empty document", () => {
    expect(parsePolicyOverrides(undefined)).toEqual([]);
    expect(parsePolicyOverrides({})).toEqual([]);
  });

  it("lists every invalid field", () => {
    expect(() =>
      parsePolicyOverrides({
        rules: [{ resourceClass: "room", permission: "manage_everything" }],
      }),
    ).toThrow(PolicyConfigurationError);
  });

  it("rejects unknown keys", () => {
    expect(() => parsePolicyOverrides({ rules: [], extra: true })).toThrow(
      /Invalid metadata policy configuration/,
    );
  });

  it("rejects a class declared twice", () => {
    try {
      parsePolicyOverrides({
        rules: [
          { resourceClass: "room", publicAccess: "managers" },
          { resourceClass: "room", publicAccess: "everyone" },
        ],
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyConfigurationError);
      expect(error instanceof PolicyConfigurationError ? error.issues : []).toEqual([
        "rules: room is declared more than once",
      ]);
    }
  });
});

describe("resolvePolicyTable", () => {
  it("keeps base values for fields an override leaves out", () => {
    const table = resolvePolicyTable([{ resourceClass: "hotel", publicAccess: "everyone" }]);
    expect(table.get("hotel")).toEqual({
      resourceClass: "hotel",
      permission: "manage_rooms",
      publicAccess: "everyone",
      requesterKinds: ["staff", "app"],
      tokenGrantsPublic: false,
      concealFromStrangers: false,
    });
    expect(DEFAULT_POLICY_TABLE.get("hotel")?.publicAccess).toBe("managers");
  });

  it("needs a complete rule for a class missing from the base", () => {
    expect(() => resolvePolicyTable([{ resourceClass: "hotel" }], new Map())).toThrow(
      "Rule for hotel must declare permission and publicAccess",
    );
    const table = resolvePolicyTable(
      [{ resourceClass: "hotel", permission: "manage_pages", publicAccess: "owner" }],
      new Map(),
    );
    expect(table.get("hotel")?.requesterKinds).toEqual(["staff", "app"]);
  });
});

describe("loadPolicyOverrides", () => {
  it("reads YAML files", async () => {
    const overrides = await loadPolicyOverrides(fixture("hotel-public.yaml"));
    expect(overrides).toEqual([
      { resourceClass: "hotel", publicAccess: "everyone" },
      { resourceClass: "staff", requesterKinds: ["staff", "app"] },
    ]);
  });

  it("reads JSON files", async () => {
    const overrides = await loadPolicyOverrides(fixture("override.json"));
    expect(overrides).toEqual([{ resourceClass: "checkout", concealFromStrangers: false }]);
  });

  it("reads YAML and JSON from files without a known extension", async () => {
    await expect(loadPolicyOverrides(fixture("rooms-managed.policy"))).resolves.toEqual([
      { resourceClass: "room", publicAccess: "managers" },
    ]);
    await expect(loadPolicyOverrides(fixture("apps-token.policy"))).resolves.toEqual([
      { resourceClass: "app", tokenGrantsPublic: true },
    ]);
  });

  it("reports schema issues with their path", async () => {
    await expect(loadPolicyOverrides(fixture("invalid-policy.yaml"))).rejects.toThrow(
      /rules\.0\.resourceClass/,
    );
  });
});

describe("loadPolicyTable", () => {
  it("returns the default table without a file", async () => {
    expect(await loadPolicyTable()).toBe(DEFAULT_POLICY_TABLE);
  });

  it("applies file overrides to evaluation", async () => {
    const table = await loadPolicyTable(fixture("hotel-public.yaml"));
    expect(canView(ANONYMOUS_REQUESTER, hotel, "public", { table }).allow).toBe(true);
    expect(canView(ANONYMOUS_REQUESTER, hotel, "public").allow).toBe(false);
  });
});
