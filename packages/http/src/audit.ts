import { redactMetadata } from '@fxdesk/observability';

export interface AuditQueryable {
  query: (sql: string, params?: unknown[]) => Promise<{ rows: unknown[] }>;
}

export type AuditActorType = 'user' | 'system';

export interface AuditEntry {
  actorType: AuditActorType;
  actorId: string;
  action: string;
  entityType: string;
  entityId: string;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/** Writes one append-only audit row on `db`, which may be a transaction client. */
export async function appendAuditLog(params: AuditEntry & { db: AuditQueryable }): Promise<void> {
  await params.db.query(
    `
    insert into audit_log (actor_type, actor_id, action, entity_type, entity_id, reason, metadata)
    values ($1, $2, $3, $4, $5, $6, $7)
    `,
    [
      params.actorType,
      params.actorId,
      params.action,
      params.entityType,
      params.entityId,
      params.reason ?? null,
      params.metadata ? redactMetadata(params.metadata) : null
    ]
  );
}
