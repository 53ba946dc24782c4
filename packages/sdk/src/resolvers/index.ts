import { z } from "zod";

import {
  ok,
  partitionOf,
  toMetadataItems,
  type EntityKind,
  type MetadataItem,
  type MetadataPartition,
  type MetaguardError,
  type Requester,
  type Result,
} from "@metaguard/contracts";

import type { MetaguardSdkContext } from "../context.js";
import { authorizeAccess } from "../shared/access.js";
import { createValidationError } from "../shared/errors.js";
import { entityReferenceSchema, requesterSchema } from "../shared/schemas.js";
import { instrumentOperation } from "../shared/telemetry.js";
import { safeParse } from "../shared/validation.js";

/**
 * How a resolver locates its entity: by id, by opaque token (checkouts and orders), or a
 * fulfillment through its order's token.
 */
export type EntityLocator =
  | { readonly id: string }
  | { readonly token: string }
  | { readonly id: string; readonly orderToken: string };

export interface ReadMetadataInput {
  readonly requester: Requester;
  readonly reference: EntityLocator;
}

export type MetadataReadResult = Result<ReadonlyArray<MetadataItem>, MetaguardError>;

export interface EntityMetadataResolver {
  readonly readPublicMetadata: (input: ReadMetadataInput) => Promise<MetadataReadResult>;
  readonly readPrivateMetadata: (input: ReadMetadataInput) => Promise<MetadataReadResult>;
}

export type EntityResolvers = { readonly [TKind in EntityKind]: EntityMetadataResolver };

const readInputSchema = z.object({
  requester: requesterSchema,
  reference: entityReferenceSchema,
});

const createRead =
  (context: MetaguardSdkContext, kind: EntityKind, partition: MetadataPartition) =>
  async (input: ReadMetadataInput): Promise<MetadataReadResult> => {
    const parsed = safeParse(
      readInputSchema,
      { requester: input.requester, reference: { ...input.reference, kind } },
      createValidationError,
    );
    if (!parsed.ok) {
      return parsed;
    }

    const access = await authorizeAccess(context, {
      requester: parsed.value.requester,
      reference: parsed.value.reference,
      partition,
      mode: "read",
    });
    if (!access.ok) {
      return access;
    }
    return ok(toMetadataItems(partitionOf(access.value, partition)));
  };

const createEntityMetadataResolver = (
  context: MetaguardSdkContext,
  kind: EntityKind,
): EntityMetadataResolver => {
  const moduleName = `resolvers.${kind}`;
  return {
    readPublicMetadata: instrumentOperation(
      context.telemetry,
      moduleName,
      "readPublicMetadata",
      createRead(context, kind, "public"),
    ),
    readPrivateMetadata: instrumentOperation(
      context.telemetry,
      moduleName,
      "readPrivateMetadata",
      createRead(context, kind, "private"),
    ),
  };
};

/**
 * Creates the public/private metadata accessors for every entity kind.
 */
export const createEntityResolvers = (context: MetaguardSdkContext): EntityResolvers => ({
  user: createEntityMetadataResolver(context, "user"),
  order: createEntityMetadataResolver(context, "order"),
  checkout: createEntityMetadataResolver(context, "checkout"),
  fulfillment: createEntityMetadataResolver(context, "fulfillment"),
  room: createEntityMetadataResolver(context, "room"),
  room_type: createEntityMetadataResolver(context, "room_type"),
  room_variant: createEntityMetadataResolver(context, "room_variant"),
  category: createEntityMetadataResolver(context, "category"),
  collection: createEntityMetadataResolver(context, "collection"),
  attribute: createEntityMetadataResolver(context, "attribute"),
  page_type: createEntityMetadataResolver(context, "page_type"),
  digital_content: createEntityMetadataResolver(context, "digital_content"),
  app: createEntityMetadataResolver(context, "app"),
  hotel: createEntityMetadataResolver(context, "hotel"),
});
