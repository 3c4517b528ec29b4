import type { AuditActorType } from '@fxdesk/http';

export interface AuditRecord {
  id: number;
  actorType: AuditActorType;
  actorId: string;
  action: string;
  entityType: string;
  entityId: string;
  reason: string | null;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
}

export interface AuditTrailPort {
  /** Entries for one entity, oldest first. */
  findByEntity(entityType: string, entityId: string): Promise<AuditRecord[]>;
}
