import { getDb, schema } from '@fxdesk/db';
import { and, asc, eq } from 'drizzle-orm';
import { asPersistenceError } from '../../lib/persistence.js';
import type { AuditRecord, AuditTrailPort } from './types.js';

type AuditRow = typeof schema.auditLog.$inferSelect;

function toActorType(value: string): AuditRecord['actorType'] {
  return value === 'system' ? 'system' : 'user';
}

function mapAuditRow(row: AuditRow): AuditRecord {
  return {
    id: row.id,
    actorType: toActorType(row.actorType),
    actorId: row.actorId,
    action: row.action,
    entityType: row.entityType,
    entityId: row.entityId,
    reason: row.reason,
    metadata: row.metadata,
    createdAt: row.createdAt
  };
}

/** Read side of the audit trail. Entries are only ever written inside repository transactions. */
export class AuditService implements AuditTrailPort {
  private readonly db = getDb();

  async findByEntity(entityType: string, entityId: string): Promise<AuditRecord[]> {
    try {
      const rows = await this.db
        .select()
        .from(schema.auditLog)
        .where(and(eq(schema.auditLog.entityType, entityType), eq(schema.auditLog.entityId, entityId)))
        .orderBy(asc(schema.auditLog.createdAt), asc(schema.auditLog.id));
      return rows.map(mapAuditRow);
    } catch (error) {
      throw asPersistenceError('audit_lookup', error);
    }
  }
}
