export { appendAuditLog, type AuditActorType, type AuditEntry, type AuditQueryable } from './audit.js';
export { deny, errorEnvelope, registerErrorHandler, resolveError, sendError, type ErrorBody, type ResolvedError } from './errors.js';
export { registerServiceMetrics } from './metrics.js';
export { runService, runServiceAndExit, type ListenAddress, type RunningService, type ServiceBootstrapOptions } from './bootstrap.js';
