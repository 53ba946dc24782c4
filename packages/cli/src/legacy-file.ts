import { z } from "zod";

import { toMetadataItems, type MetadataItem } from "@metaguard/contracts";
import { upgradeLegacyRecord } from "@metaguard/metadata-memory";
import { readStructuredFile } from "@metaguard/policy";

const legacyRecordSchema = z
  .object({
    metadata: z.unknown().optional(),
    privateMetadata: z.unknown().optional(),
  })
  .strict();

export interface FlattenedMetadata {
  readonly metadata: ReadonlyArray<MetadataItem>;
  readonly privateMetadata: ReadonlyArray<MetadataItem>;
}

export const flattenLegacyFile = async (filePath: string): Promise<FlattenedMetadata> => {
  const parsed = legacyRecordSchema.safeParse(await readStructuredFile(filePath));
  if (!parsed.success) {
    throw new Error(`${filePath} must hold an object with metadata and privateMetadata`);
  }
  const upgraded = upgradeLegacyRecord(parsed.data);
  return {
    metadata: toMetadataItems(upgraded.metadata),
    privateMetadata: toMetadataItems(upgraded.privateMetadata),
  };
};
