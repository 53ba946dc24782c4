import { randomUUID } from "node:crypto";

import {
  ok,
  type AppendAuditEventInput,
  type AuditEventRecord,
  type AuditLogPort,
  type MetaguardError,
  type Result,
} from "@metaguard/contracts";

import { clone } from "./clone.js";

export interface MemoryAuditLogOptions {
  readonly clock?: () => Date;
  readonly idFactory?: () => string;
  /**
   * Oldest events are dropped once the log holds this many.
   */
  readonly capacity?: number;
}

const DEFAULT_CAPACITY = 1000;

export class MemoryAuditLog implements AuditLogPort {
  private readonly events: AuditEventRecord[] = [];
  private readonly clock: () => Date;
  private readonly idFactory: () => string;
  private readonly capacity: number;

  constructor(options: MemoryAuditLogOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CAPACITY);
  }

  async appendEvent(input: AppendAuditEventInput): Promise<Result<AuditEventRecord, MetaguardError>> {
    const record: AuditEventRecord = {
      id: this.idFactory(),
      occurredAt: input.occurredAt ?? this.clock().toISOString(),
      category: input.category,
      action: input.action,
      outcome: input.outcome,
      actor: input.actor ? clone(input.actor) : undefined,
      resource: input.resource ? clone(input.resource) : undefined,
      metadata: input.metadata ? clone(input.metadata) : undefined,
    };
    this.events.push(record);
    if (this.events.length > this.capacity) {
      this.events.splice(0, this.events.length - this.capacity);
    }
    return ok(clone(record));
  }

  async listEvents(): Promise<Result<ReadonlyArray<AuditEventRecord>, MetaguardError>> {
    return ok(this.events.map((event) => clone(event)));
  }
}

export const createMemoryAuditLog = (options: MemoryAuditLogOptions = {}): MemoryAuditLog =>
  new MemoryAuditLog(options);
