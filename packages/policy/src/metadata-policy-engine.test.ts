import { describe, expect, it } from "vitest";

import {
  ANONYMOUS_REQUESTER,
  CATALOG_ENTITY_KINDS,
  type CatalogEntityKind,
  type MetadataEntity,
  type Permission,
  type Requester,
} from "@metaguard/contracts";

import {
  MetadataPolicyEngine,
  UnmappedEntityError,
  canManage,
  canView,
  createPolicyTable,
  DEFAULT_POLICY_RULES,
  isConcealed,
  resolveResourceClass,
} from "./index.js";

const customer = (userId = "customer-1", permissions: Permission[] = []): Requester => ({
  kind: "customer",
  userId,
  permissions,
});

const staff = (permissions: Permission[], userId = "staff-1"): Requester => ({
  kind: "staff",
  userId,
  permissions,
});

const app = (permissions: Permission[], appId = "app-1"): Requester => ({
  kind: "app",
  appId,
  permissions,
});

const emptyMaps = { metadata: { key: "value" }, privateMetadata: { private_key: "private_value" } };

const customerUser: MetadataEntity = {
  kind: "user",
  id: "customer-1",
  email: "customer@example.com",
  isStaff: false,
  ...emptyMaps,
};

const adminUser: MetadataEntity = {
  kind: "user",
  id: "admin-1",
  email: "admin@example.com",
  isStaff: true,
  ...emptyMaps,
};

const checkout = (ownerId?: string): MetadataEntity => ({
  kind: "checkout",
  id: "checkout-1",
  token: "checkout-token",
  ownerId,
  ...emptyMaps,
});

const order = (status: "unfulfilled" | "draft" = "unfulfilled", ownerId = "customer-1"): MetadataEntity => ({
  kind: "order",
  id: "order-1",
  token: "order-token",
  status,
  ownerId,
  ...emptyMaps,
});

const fulfillment: MetadataEntity = {
  kind: "fulfillment",
  id: "fulfillment-1",
  orderId: "order-1",
  orderToken: "order-token",
  ownerId: "customer-1",
  ...emptyMaps,
};

const catalog = (kind: CatalogEntityKind): MetadataEntity => ({ kind, id: `${kind}-1`, ...emptyMaps });

const installedApp: MetadataEntity = { kind: "app", id: "app-9", name: "Sync", ...emptyMaps };

describe("resolveResourceClass", () => {
  it("splits users into staff and customers", () => {
    expect(resolveResourceClass(customerUser)).toBe("customer");
    expect(resolveResourceClass(adminUser)).toBe("staff");
  });

  it("treats draft orders as their own class", () => {
    expect(resolveResourceClass(order("draft"))).toBe("draft_order");
    expect(resolveResourceClass(order())).toBe("order");
  });

  it("maps every other kind to the class of the same name", () => {
    expect(resolveResourceClass(fulfillment)).toBe("fulfillment");
    expect(resolveResourceClass(catalog("room_variant"))).toBe("room_variant");
  });
});

describe("canView on users", () => {
  it("lets customers and staff read their own public metadata", () => {
    expect(canView(customer(), customerUser, "public")).toEqual({
      allow: true,
      reason: "metadata.public.owner",
    });
    expect(canView(staff([], "admin-1"), adminUser, "public").allow).toBe(true);
  });

  it("lets staff and apps with manage_users read customer metadata", () => {
    expect(canView(staff(["manage_users"]), customerUser, "public").allow).toBe(true);
    expect(canView(app(["manage_users"]), customerUser, "public").allow).toBe(true);
    expect(canView(staff(["manage_users"]), customerUser, "private").allow).toBe(true);
    expect(canView(app(["manage_users"]), customerUser, "private").allow).toBe(true);
  });

  it("lets staff with manage_staff read another staff member", () => {
    expect(canView(staff(["manage_staff"]), adminUser, "public").allow).toBe(true);
    expect(canView(staff(["manage_staff"]), adminUser, "private")).toEqual({
      allow: true,
      reason: "metadata.permission.granted",
    });
  });

  it("denies staff holding only manage_users on another staff member's private metadata", () => {
    expect(canView(staff(["manage_users"]), adminUser, "private")).toEqual({
      allow: false,
      reason: "metadata.permission.missing",
    });
  });

  it("never lets apps read staff metadata", () => {
    expect(canView(app(["manage_staff"]), adminUser, "public")).toEqual({
      allow: false,
      reason: "metadata.requester.kind_not_allowed",
    });
    expect(canView(app(["manage_staff"]), adminUser, "private").allow).toBe(false);
  });

  it("denies own private metadata without the staff management permission", () => {
    expect(canView(customer(), customerUser, "private").allow).toBe(false);
    expect(canView(staff(["manage_users"], "admin-1"), adminUser, "private").allow).toBe(false);
    expect(canView(staff(["manage_staff"], "admin-1"), adminUser, "private").allow).toBe(true);
  });

  it("denies a customer reading someone else", () => {
    expect(canView(customer("customer-2"), customerUser, "public").allow).toBe(false);
  });
});

describe("canView on checkouts", () => {
  it("lets anyone holding the token read an unclaimed checkout", () => {
    expect(canView(ANONYMOUS_REQUESTER, checkout(), "public", { lookup: "token" })).toEqual({
      allow: true,
      reason: "metadata.public.token",
    });
  });

  it("conceals a checkout owned by another customer", () => {
    const owned = checkout("customer-1");
    expect(canView(ANONYMOUS_REQUESTER, owned, "public", { lookup: "token" })).toEqual({
      allow: false,
      reason: "metadata.entity.concealed",
      conceal: true,
    });
    expect(canView(ANONYMOUS_REQUESTER, owned, "private", { lookup: "token" }).conceal).toBe(true);
    expect(isConcealed(customer("customer-2"), owned)).toBe(true);
    expect(isConcealed(customer("customer-1"), owned)).toBe(false);
    expect(isConcealed(staff(["manage_checkouts"]), owned)).toBe(false);
  });

  it("lets the owner read public but not private metadata", () => {
    const owned = checkout("customer-1");
    expect(canView(customer(), owned, "public", { lookup: "token" }).allow).toBe(true);
    expect(canView(customer(), owned, "private", { lookup: "token" }).allow).toBe(false);
  });

  it("requires manage_checkouts for staff and apps", () => {
    const owned = checkout("customer-1");
    expect(canView(staff(["manage_checkouts"]), owned, "private").allow).toBe(true);
    expect(canView(app(["manage_checkouts"]), owned, "private").allow).toBe(true);
    expect(isConcealed(staff(["manage_orders"]), owned)).toBe(true);
  });

  it("denies anonymous private reads of an unclaimed checkout", () => {
    expect(canView(ANONYMOUS_REQUESTER, checkout(), "private", { lookup: "token" })).toEqual({
      allow: false,
      reason: "metadata.anonymous.denied",
    });
  });
});

describe("canView on orders and fulfillments", () => {
  it("lets token holders read public order metadata", () => {
    expect(canView(ANONYMOUS_REQUESTER, order(), "public", { lookup: "token" }).allow).toBe(true);
    expect(canView(ANONYMOUS_REQUESTER, fulfillment, "public", { lookup: "token" }).allow).toBe(true);
  });

  it("denies anonymous reads by id", () => {
    expect(canView(ANONYMOUS_REQUESTER, order(), "public", { lookup: "id" }).allow).toBe(false);
    expect(canView(ANONYMOUS_REQUESTER, order(), "public").allow).toBe(false);
  });

  it("lets the owner read public metadata by id", () => {
    expect(canView(customer(), order(), "public").allow).toBe(true);
    expect(canView(customer(), fulfillment, "public").allow).toBe(true);
  });

  it("keeps private order metadata for manage_orders holders", () => {
    expect(canView(customer(), order(), "private", { lookup: "token" }).allow).toBe(false);
    expect(canView(ANONYMOUS_REQUESTER, fulfillment, "private", { lookup: "token" }).allow).toBe(false);
    expect(canView(staff(["manage_orders"]), order(), "private").allow).toBe(true);
    expect(canView(app(["manage_orders"]), fulfillment, "private").allow).toBe(true);
  });

  it("shows draft orders to their owner and managers only", () => {
    const draft = order("draft");
    expect(canView(ANONYMOUS_REQUESTER, draft, "public", { lookup: "token" }).allow).toBe(false);
    expect(canView(customer("customer-2"), draft, "public", { lookup: "token" }).allow).toBe(false);
    expect(canView(customer(), draft, "public")).toEqual({ allow: true, reason: "metadata.public.owner" });
    expect(canView(customer(), draft, "public", { lookup: "token" }).allow).toBe(true);
    expect(canView(customer(), draft, "private").allow).toBe(false);
    expect(canView(staff(["manage_orders"]), draft, "public").allow).toBe(true);
    expect(canView(app(["manage_orders"]), draft, "private").allow).toBe(true);
  });
});

describe("canView on catalog entities", () => {
  const globallyReadable: CatalogEntityKind[] = [
    "room",
    "room_type",
    "room_variant",
    "category",
    "collection",
    "attribute",
    "page_type",
  ];

  it.each(globallyReadable)("lets anyone read public metadata of %s", (kind) => {
    expect(canView(ANONYMOUS_REQUESTER, catalog(kind), "public")).toEqual({
      allow: true,
      reason: "metadata.public.everyone",
    });
    expect(canView(customer(), catalog(kind), "public").allow).toBe(true);
  });

  it.each(["digital_content", "hotel"] as const)("restricts public metadata of %s to managers", (kind) => {
    expect(canView(ANONYMOUS_REQUESTER, catalog(kind), "public").allow).toBe(false);
    expect(canView(customer(), catalog(kind), "public").allow).toBe(false);
    expect(canView(staff(["manage_rooms"]), catalog(kind), "public").allow).toBe(true);
    expect(canView(app(["manage_rooms"]), catalog(kind), "public").allow).toBe(true);
  });

  it.each(CATALOG_ENTITY_KINDS)("requires manage_rooms for private metadata of %s", (kind) => {
    expect(canView(customer(), catalog(kind), "private").allow).toBe(false);
    expect(canView(staff(["manage_orders"]), catalog(kind), "private").allow).toBe(false);
    expect(canView(staff(["manage_rooms"]), catalog(kind), "private").allow).toBe(true);
    expect(canView(app(["manage_rooms"]), catalog(kind), "private").allow).toBe(true);
  });
});

describe("canView on apps", () => {
  it("requires manage_apps for other requesters", () => {
    expect(canView(ANONYMOUS_REQUESTER, installedApp, "public").allow).toBe(false);
    expect(canView(customer(), installedApp, "public").allow).toBe(false);
    expect(canView(staff(["manage_apps"]), installedApp, "private").allow).toBe(true);
    expect(canView(app(["manage_apps"]), installedApp, "private").allow).toBe(true);
  });

  it("lets an app read its own public metadata only", () => {
    expect(canView(app([], "app-9"), installedApp, "public").reason).toBe("metadata.public.owner");
    expect(canView(app([], "app-9"), installedApp, "private").allow).toBe(false);
  });

  it("does not confuse a user id with an app id", () => {
    expect(canView(customer("app-9"), installedApp, "public").allow).toBe(false);
  });
});

describe("policy properties", () => {
  const entities: MetadataEntity[] = [
    customerUser,
    adminUser,
    checkout("customer-1"),
    checkout(),
    order(),
    order("draft"),
    fulfillment,
    installedApp,
    ...CATALOG_ENTITY_KINDS.map(catalog),
  ];

  it("always shows public metadata to the owner", () => {
    const owned: Array<[Requester, MetadataEntity]> = [
      [customer(), customerUser],
      [staff([], "admin-1"), adminUser],
      [customer(), checkout("customer-1")],
      [customer(), order()],
      [customer(), order("draft")],
      [customer(), fulfillment],
      [app([], "app-9"), installedApp],
    ];
    for (const [owner, entity] of owned) {
      for (const lookup of ["id", "token"] as const) {
        expect(canView(owner, entity, "public", { lookup })).toEqual({
          allow: true,
          reason: "metadata.public.owner",
        });
      }
    }
  });

  it("never shows private metadata to anonymous requesters", () => {
    for (const entity of entities) {
      for (const lookup of ["id", "token"] as const) {
        expect(canView(ANONYMOUS_REQUESTER, entity, "private", { lookup }).allow).toBe(false);
      }
    }
  });

  it("never shows private metadata to requesters without permissions", () => {
    const requesters = [customer("customer-1"), staff([], "admin-1"), app([], "app-9")];
    for (const entity of entities) {
      for (const requester of requesters) {
        expect(canView(requester, entity, "private").allow).toBe(false);
      }
    }
  });
});

describe("canManage", () => {
  it("requires the managing permission even for owners", () => {
    expect(canManage(customer(), customerUser).allow).toBe(false);
    expect(canManage(staff(["manage_users"]), customerUser).allow).toBe(true);
    expect(canManage(ANONYMOUS_REQUESTER, catalog("room")).reason).toBe("metadata.anonymous.denied");
  });

  it("conceals owned checkouts from strangers", () => {
    expect(canManage(customer("customer-2"), checkout("customer-1")).conceal).toBe(true);
  });
});

describe("MetadataPolicyEngine", () => {
  it("evaluates reads and writes through the port", async () => {
    const engine = new MetadataPolicyEngine();
    const read = await engine.evaluate({
      requester: ANONYMOUS_REQUESTER,
      entity: catalog("category"),
      partition: "public",
    });
    expect(read).toEqual({ ok: true, value: { allow: true, reason: "metadata.public.everyone" } });

    const write = await engine.evaluate({
      requester: ANONYMOUS_REQUESTER,
      entity: catalog("category"),
      partition: "public",
      mode: "write",
    });
    expect(write).toEqual({ ok: true, value: { allow: false, reason: "metadata.anonymous.denied" } });
  });

  it("reports entities without a rule as unmapped", async () => {
    const table = createPolicyTable(DEFAULT_POLICY_RULES.filter((rule) => rule.resourceClass !== "hotel"));
    const engine = new MetadataPolicyEngine({ table });

    expect(() => engine.canView(staff(["manage_rooms"]), catalog("hotel"), "public")).toThrow(
      UnmappedEntityError,
    );

    const result = await engine.evaluate({
      requester: staff(["manage_rooms"]),
      entity: catalog("hotel"),
      partition: "public",
    });
    expect(result).toEqual({
      ok: false,
      error: {
        code: "metadata.unmapped_entity",
        message: "Resource class hotel has no metadata policy rule.",
        details: { resourceClass: "hotel", entityKind: "hotel" },
      },
    });
  });
});
