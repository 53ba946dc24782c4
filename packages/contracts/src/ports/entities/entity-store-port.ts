import type { MetaguardError } from "../../types/domain-error.js";
import type {
  EntityReference,
  MetadataEntity,
  MetadataMap,
  MetadataPartition,
} from "../../types/metadata.js";
import type { Result } from "../../types/result.js";

export interface EntityStorePort {
  findEntity(reference: EntityReference): Promise<MetadataEntity | undefined>;
  saveEntity(entity: MetadataEntity): Promise<MetadataEntity>;
  deleteEntity(reference: EntityReference): Promise<void>;
  storeMetadata(
    reference: EntityReference,
    partition: MetadataPartition,
    items: MetadataMap,
  ): Promise<Result<MetadataEntity, MetaguardError>>;
  deleteMetadataKeys(
    reference: EntityReference,
    partition: MetadataPartition,
    keys: ReadonlyArray<string>,
  ): Promise<Result<MetadataEntity, MetaguardError>>;
  clearMetadata(
    reference: EntityReference,
    partition: MetadataPartition,
  ): Promise<Result<MetadataEntity, MetaguardError>>;
}
