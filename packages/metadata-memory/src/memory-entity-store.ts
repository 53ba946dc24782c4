import {
  err,
  ok,
  type EntityReference,
  type EntityStorePort,
  type MetadataEntity,
  type MetadataMap,
  type MetadataPartition,
  type MetaguardError,
  type Result,
} from "@metaguard/contracts";

import { clone } from "./clone.js";

export interface InMemoryEntityStoreOptions {
  readonly initialEntities?: ReadonlyArray<MetadataEntity>;
}

const entityKey = (kind: string, id: string): string => `${kind}:${id}`;

const withPartition = (
  entity: MetadataEntity,
  partition: MetadataPartition,
  metadata: MetadataMap,
): MetadataEntity =>
  partition === "public" ? { ...entity, metadata } : { ...entity, privateMetadata: metadata };

const notFound = (reference: EntityReference): MetaguardError => ({
  code: "metadata.not_found",
  message: `${reference.kind} was not found.`,
  details: { kind: reference.kind },
});

export class InMemoryEntityStore implements EntityStorePort {
  private readonly entities = new Map<string, MetadataEntity>();
  private readonly tokenIndex = new Map<string, string>();

  constructor(options: InMemoryEntityStoreOptions = {}) {
    for (const entity of options.initialEntities ?? []) {
      this.save(entity);
    }
  }

  async findEntity(reference: EntityReference): Promise<MetadataEntity | undefined> {
    const entity = this.resolve(reference);
    return entity ? clone(entity) : undefined;
  }

  async saveEntity(entity: MetadataEntity): Promise<MetadataEntity> {
    return clone(this.save(entity));
  }

  async deleteEntity(reference: EntityReference): Promise<void> {
    const existing = this.resolve(reference);
    if (!existing) {
      return;
    }
    this.entities.delete(entityKey(existing.kind, existing.id));
    if (existing.kind === "checkout" || existing.kind === "order") {
      this.tokenIndex.delete(entityKey(existing.kind, existing.token));
    }
  }

  async storeMetadata(
    reference: EntityReference,
    partition: MetadataPartition,
    items: MetadataMap,
  ): Promise<Result<MetadataEntity, MetaguardError>> {
    return this.update(reference, partition, (current) => ({ ...current, ...items }));
  }

  async deleteMetadataKeys(
    reference: EntityReference,
    partition: MetadataPartition,
    keys: ReadonlyArray<string>,
  ): Promise<Result<MetadataEntity, MetaguardError>> {
    const removed = new Set(keys);
    return this.update(reference, partition, (current) =>
      Object.fromEntries(Object.entries(current).filter(([key]) => !removed.has(key))),
    );
  }

  async clearMetadata(
    reference: EntityReference,
    partition: MetadataPartition,
  ): Promise<Result<MetadataEntity, MetaguardError>> {
    return this.update(reference, partition, () => ({}));
  }

  private update(
    reference: EntityReference,
    partition: MetadataPartition,
    change: (current: MetadataMap) => MetadataMap,
  ): Result<MetadataEntity, MetaguardError> {
    const existing = this.resolve(reference);
    if (!existing) {
      return err(notFound(reference));
    }
    const current = partition === "public" ? existing.metadata : existing.privateMetadata;
    const stored = this.save(withPartition(existing, partition, change(current)));
    return ok(clone(stored));
  }

  private resolve(reference: EntityReference): MetadataEntity | undefined {
    if ("token" in reference) {
      const id = this.tokenIndex.get(entityKey(reference.kind, reference.token));
      return id ? this.entities.get(entityKey(reference.kind, id)) : undefined;
    }

    const entity = this.entities.get(entityKey(reference.kind, reference.id));
    if ("orderToken" in reference) {
      return entity?.kind === "fulfillment" && entity.orderToken === reference.orderToken
        ? entity
        : undefined;
    }
    return entity;
  }

  private save(entity: MetadataEntity): MetadataEntity {
    const stored = clone(entity);
    const key = entityKey(stored.kind, stored.id);
    const previous = this.entities.get(key);
    if (previous && (previous.kind === "checkout" || previous.kind === "order")) {
      this.tokenIndex.delete(entityKey(previous.kind, previous.token));
    }
    this.entities.set(key, stored);
    if (stored.kind === "checkout" || stored.kind === "order") {
      this.tokenIndex.set(entityKey(stored.kind, stored.token), stored.id);
    }
    return stored;
  }
}

export const createInMemoryEntityStore = (options: InMemoryEntityStoreOptions = {}): InMemoryEntityStore =>
  new InMemoryEntityStore(options);
