import { z } from "zod";

import {
  ok,
  partitionOf,
  toMetadataItems,
  type EntityReference,
  type MetadataItem,
  type MetadataPartition,
  type MetaguardError,
  type Requester,
  type Result,
} from "@metaguard/contracts";

import type { MetaguardSdkContext } from "../context.js";
import { authorizeAccess } from "../shared/access.js";
import { createValidationError } from "../shared/errors.js";
import {
  entityReferenceSchema,
  metadataItemSchema,
  partitionSchema,
  requesterSchema,
} from "../shared/schemas.js";
import { instrumentOperation } from "../shared/telemetry.js";
import { safeParse } from "../shared/validation.js";

type MetadataItemsResult = Result<ReadonlyArray<MetadataItem>, MetaguardError>;

export interface ReadPartitionInput {
  readonly requester: Requester;
  readonly reference: EntityReference;
  readonly partition: MetadataPartition;
}

export interface UpdateMetadataInput extends ReadPartitionInput {
  readonly items: ReadonlyArray<MetadataItem>;
}

export interface DeleteMetadataInput extends ReadPartitionInput {
  readonly keys: ReadonlyArray<string>;
}

/**
 * Partition-generic metadata operations. Writes require the managing permission of the
 * entity's resource class, for public and private metadata alike.
 */
export interface MetadataModule {
  readonly readMetadata: (input: ReadPartitionInput) => Promise<MetadataItemsResult>;
  readonly updateMetadata: (input: UpdateMetadataInput) => Promise<MetadataItemsResult>;
  readonly deleteMetadata: (input: DeleteMetadataInput) => Promise<MetadataItemsResult>;
}

const readPartitionSchema = z.object({
  requester: requesterSchema,
  reference: entityReferenceSchema,
  partition: partitionSchema,
});

const updateMetadataSchema = readPartitionSchema.extend({
  items: z.array(metadataItemSchema).min(1, "At least one metadata item is required."),
});

const deleteMetadataSchema = readPartitionSchema.extend({
  keys: z.array(z.string().min(1)).min(1, "At least one metadata key is required."),
});

const createReadMetadata =
  (context: MetaguardSdkContext): MetadataModule["readMetadata"] =>
  async (input) => {
    const parsed = safeParse(readPartitionSchema, input, createValidationError);
    if (!parsed.ok) {
      return parsed;
    }
    const access = await authorizeAccess(context, { ...parsed.value, mode: "read" });
    if (!access.ok) {
      return access;
    }
    return ok(toMetadataItems(partitionOf(access.value, parsed.value.partition)));
  };

const createUpdateMetadata =
  (context: MetaguardSdkContext): MetadataModule["updateMetadata"] =>
  async (input) => {
    const parsed = safeParse(updateMetadataSchema, input, createValidationError);
    if (!parsed.ok) {
      return parsed;
    }
    const { requester, reference, partition, items } = parsed.value;
    const access = await authorizeAccess(context, { requester, reference, partition, mode: "write" });
    if (!access.ok) {
      return access;
    }

    const values = Object.fromEntries(items.map((item) => [item.key, item.value]));
    const stored = await context.deps.entityStore.storeMetadata(reference, partition, values);
    if (!stored.ok) {
      return stored;
    }
    return ok(toMetadataItems(partitionOf(stored.value, partition)));
  };

const createDeleteMetadata =
  (context: MetaguardSdkContext): MetadataModule["deleteMetadata"] =>
  async (input) => {
    const parsed = safeParse(deleteMetadataSchema, input, createValidationError);
    if (!parsed.ok) {
      return parsed;
    }
    const { requester, reference, partition, keys } = parsed.value;
    const access = await authorizeAccess(context, { requester, reference, partition, mode: "write" });
    if (!access.ok) {
      return access;
    }

    const stored = await context.deps.entityStore.deleteMetadataKeys(reference, partition, keys);
    if (!stored.ok) {
      return stored;
    }
    return ok(toMetadataItems(partitionOf(stored.value, partition)));
  };

/**
 * Creates the {@link MetadataModule} bound to the provided context.
 */
export const createMetadataModule = (context: MetaguardSdkContext): MetadataModule => ({
  readMetadata: instrumentOperation(context.telemetry, "metadata", "readMetadata", createReadMetadata(context)),
  updateMetadata: instrumentOperation(
    context.telemetry,
    "metadata",
    "updateMetadata",
    createUpdateMetadata(context),
  ),
  deleteMetadata: instrumentOperation(
    context.telemetry,
    "metadata",
    "deleteMetadata",
    createDeleteMetadata(context),
  ),
});
