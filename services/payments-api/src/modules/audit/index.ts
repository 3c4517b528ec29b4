export { AuditService } from './service.js';
export type { AuditRecord, AuditTrailPort } from './types.js';
