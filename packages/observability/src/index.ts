export { formatLogEntry, log, type LogEntry, type LogLevel } from './logger.js';
export {
  createServiceLogger,
  redactMetadata,
  type ExtendedLogLevel,
  type ServiceLogger,
  type ServiceLoggerConfig
} from './service-logger.js';
export { createServiceMetrics, type ServiceMetrics } from './metrics.js';
