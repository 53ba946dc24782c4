export type MetadataMap = Readonly<Record<string, string>>;

export type MetadataPartition = "public" | "private";

export interface MetadataItem {
  readonly key: string;
  readonly value: string;
}

export const ENTITY_KINDS = [
  "user",
  "order",
  "checkout",
  "fulfillment",
  "room",
  "room_type",
  "room_variant",
  "category",
  "collection",
  "attribute",
  "page_type",
  "digital_content",
  "app",
  "hotel",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export const CATALOG_ENTITY_KINDS = [
  "room",
  "room_type",
  "room_variant",
  "category",
  "collection",
  "attribute",
  "page_type",
  "digital_content",
  "hotel",
] as const;

export type CatalogEntityKind = (typeof CATALOG_ENTITY_KINDS)[number];

export const RESOURCE_CLASSES = [
  "customer",
  "staff",
  "checkout",
  "order",
  "draft_order",
  "fulfillment",
  "room",
  "room_type",
  "room_variant",
  "category",
  "collection",
  "attribute",
  "page_type",
  "digital_content",
  "app",
  "hotel",
] as const;

export type ResourceClass = (typeof RESOURCE_CLASSES)[number];

export const ORDER_STATUSES = ["draft", "unconfirmed", "unfulfilled", "fulfilled", "canceled"] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

interface EntityBase {
  readonly id: string;
  readonly metadata: MetadataMap;
  readonly privateMetadata: MetadataMap;
}

export interface UserEntity extends EntityBase {
  readonly kind: "user";
  readonly email: string;
  readonly isStaff: boolean;
}

export interface CheckoutEntity extends EntityBase {
  readonly kind: "checkout";
  readonly token: string;
  readonly ownerId?: string;
}

export interface OrderEntity extends EntityBase {
  readonly kind: "order";
  readonly token: string;
  readonly status: OrderStatus;
  readonly ownerId?: string;
}

export interface FulfillmentEntity extends EntityBase {
  readonly kind: "fulfillment";
  readonly orderId: string;
  readonly orderToken: string;
  readonly ownerId?: string;
}

export interface AppEntity extends EntityBase {
  readonly kind: "app";
  readonly name: string;
}

export interface CatalogEntity extends EntityBase {
  readonly kind: CatalogEntityKind;
  readonly name?: string;
}

/**
 * Snapshot of an entity as returned by the store, including both metadata partitions.
 */
export type MetadataEntity =
  | UserEntity
  | CheckoutEntity
  | OrderEntity
  | FulfillmentEntity
  | AppEntity
  | CatalogEntity;

export type TokenLookupKind = "checkout" | "order";

export type EntityReference =
  | { readonly kind: EntityKind; readonly id: string }
  | { readonly kind: TokenLookupKind; readonly token: string }
  | { readonly kind: "fulfillment"; readonly id: string; readonly orderToken: string };

export type LookupChannel = "id" | "token";

export const lookupChannelOf = (reference: EntityReference): LookupChannel =>
  "token" in reference || "orderToken" in reference ? "token" : "id";

export const partitionOf = (entity: MetadataEntity, partition: MetadataPartition): MetadataMap =>
  partition === "public" ? entity.metadata : entity.privateMetadata;

export const toMetadataItems = (metadata: MetadataMap): ReadonlyArray<MetadataItem> =>
  Object.entries(metadata)
    .map(([key, value]) => ({ key, value }))
    .sort((left, right) => (left.key < right.key ? -1 : left.key > right.key ? 1 : 0));
