export interface AuditActorDescriptor {
  readonly type: string;
  readonly id: string;
}

export interface AuditResourceDescriptor {
  readonly type: string;
  readonly id?: string;
}

export type AuditOutcome = "allowed" | "denied" | "concealed";

export interface AuditEventRecord {
  readonly id: string;
  readonly occurredAt: string;
  readonly category: string;
  readonly action: string;
  readonly outcome: AuditOutcome;
  readonly actor?: AuditActorDescriptor;
  readonly resource?: AuditResourceDescriptor;
  readonly metadata?: Record<string, unknown>;
}

export interface AppendAuditEventInput {
  readonly category: string;
  readonly action: string;
  readonly outcome: AuditOutcome;
  readonly occurredAt?: string;
  readonly actor?: AuditActorDescriptor;
  readonly resource?: AuditResourceDescriptor;
  readonly metadata?: Record<string, unknown>;
}
