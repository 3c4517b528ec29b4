export {
  closeDb,
  dbHealthcheck,
  getDb,
  getPool,
  normalizeQueryParams,
  type QueryClient,
  type QueryFn,
  type QueryResult,
  type Queryable
} from './client.js';
export { loadDbConfig, type DbConfig } from './pool-config.js';
export { planMigrations, type MigrationPlan } from './migrations.js';
export * as schema from './schema/index.js';
