import { z } from "zod";

import {
  ENTITY_KINDS,
  PERMISSIONS,
  type EntityReference,
  type MetadataItem,
  type MetadataPartition,
  type Requester,
} from "@metaguard/contracts";

const nonEmpty = z.string().min(1);

export const permissionSchema = z.enum(PERMISSIONS);

export const requesterSchema: z.ZodType<Requester> = z.union([
  z.object({ kind: z.literal("anonymous") }).strict(),
  z
    .object({
      kind: z.enum(["customer", "staff"]),
      userId: nonEmpty,
      permissions: z.array(permissionSchema),
    })
    .strict(),
  z
    .object({
      kind: z.literal("app"),
      appId: nonEmpty,
      permissions: z.array(permissionSchema),
    })
    .strict(),
]);

export const entityReferenceSchema: z.ZodType<EntityReference> = z.union([
  z.object({ kind: z.literal("fulfillment"), id: nonEmpty, orderToken: nonEmpty }).strict(),
  z.object({ kind: z.enum(["checkout", "order"]), token: nonEmpty }).strict(),
  z.object({ kind: z.enum(ENTITY_KINDS), id: nonEmpty }).strict(),
]);

export const partitionSchema: z.ZodType<MetadataPartition> = z.enum(["public", "private"]);

export const metadataItemSchema: z.ZodType<MetadataItem> = z.object({
  key: nonEmpty,
  value: z.string(),
});
