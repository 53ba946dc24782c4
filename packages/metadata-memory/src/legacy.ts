import { z } from "zod";

import type { MetadataMap } from "@metaguard/contracts";

export class LegacyMetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LegacyMetadataError";
  }
}

const legacyValueSchema = z.unknown().refine((value) => value !== undefined, { message: "Value is required" });

/**
 * Pre-flattening layout: `{ namespace: { client: { key: value } } }`.
 */
const legacyMetadataSchema = z.record(z.record(z.record(legacyValueSchema)));

export type LegacyMetadata = z.infer<typeof legacyMetadataSchema>;

const toValue = (value: unknown): string => (typeof value === "string" ? value : JSON.stringify(value));

/**
 * Flattens namespaced metadata into `client.key` entries. Namespaces are dropped, so two
 * namespaces holding the same client and key collide.
 */
export const flattenLegacyMetadata = (input: unknown): MetadataMap => {
  const parsed = legacyMetadataSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new LegacyMetadataError(
      `Legacy metadata must map namespaces to clients to key/value pairs: ${parsed.error.issues
        .map((issue) => issue.path.join(".") || issue.message)
        .join(", ")}`,
    );
  }

  const flattened: Record<string, string> = {};
  for (const clients of Object.values(parsed.data)) {
    for (const [clientName, values] of Object.entries(clients)) {
      for (const [key, value] of Object.entries(values)) {
        const flattenedKey = `${clientName}.${key}`;
        if (flattenedKey in flattened) {
          throw new LegacyMetadataError(`Meta key ${flattenedKey} is duplicated.`);
        }
        flattened[flattenedKey] = toValue(value);
      }
    }
  }
  return flattened;
};

export interface LegacyMetadataRecord {
  readonly metadata?: unknown;
  readonly privateMetadata?: unknown;
}

/**
 * Converts both partitions of a legacy record. Absent partitions become empty maps.
 */
export const upgradeLegacyRecord = (
  record: LegacyMetadataRecord,
): { readonly metadata: MetadataMap; readonly privateMetadata: MetadataMap } => ({
  metadata: flattenLegacyMetadata(record.metadata),
  privateMetadata: flattenLegacyMetadata(record.privateMetadata),
});
