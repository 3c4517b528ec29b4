import { loadRuntimeConfig } from '@fxdesk/config';
import { Decimal } from 'decimal.js';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';
import { loadDbConfig } from './pool-config.js';

type QueryRow = Record<string, unknown>;
type BindValue = string | number | boolean | null | Uint8Array;

let singletonSql: postgres.Sql | undefined;
let singletonDb: PostgresJsDatabase<typeof schema> | undefined;

export interface QueryResult<Row extends QueryRow = QueryRow> {
  rows: Row[];
  rowCount: number;
}

export type QueryFn = <Row extends QueryRow = QueryRow>(sql: string, params?: unknown[]) => Promise<QueryResult<Row>>;

/** One reserved connection; statements run in order, so `begin`/`commit` bracket a transaction. */
export interface QueryClient {
  query: QueryFn;
  release: () => void;
}

export interface Queryable {
  query: QueryFn;
  connect: () => Promise<QueryClient>;
}

/**
 * Bind values as postgres expects them: timestamps as ISO text, decimals as
 * exact fixed-point text (never through a float), and objects as JSON for
 * jsonb columns.
 */
function toBindValue(param: unknown): BindValue {
  if (param === null || param === undefined) {
    return null;
  }
  if (param instanceof Date) {
    return param.toISOString();
  }
  if (Decimal.isDecimal(param)) {
    return param.toFixed();
  }
  if (param instanceof Uint8Array) {
    return param;
  }
  switch (typeof param) {
    case 'string':
    case 'number':
    case 'boolean':
      return param;
    case 'bigint':
      return param.toString();
    case 'object':
      return JSON.stringify(param);
    default:
      return String(param);
  }
}

export function normalizeQueryParams(params: unknown[] = []): BindValue[] {
  return params.map(toBindValue);
}

function adapt(sql: postgres.Sql): QueryFn {
  return async <Row extends QueryRow = QueryRow>(queryText: string, params: unknown[] = []): Promise<QueryResult<Row>> => {
    const rows = await sql.unsafe<Row[]>(queryText, normalizeQueryParams(params));
    return { rows, rowCount: rows.count };
  };
}

function getSql(): postgres.Sql {
  if (singletonSql) {
    return singletonSql;
  }

  const runtime = loadRuntimeConfig();
  const config = loadDbConfig();

  singletonSql = postgres(runtime.DATABASE_URL, {
    max: config.maxConnections,
    idle_timeout: config.idleTimeoutSeconds,
    connect_timeout: config.connectTimeoutSeconds,
    max_lifetime: config.maxLifetimeSeconds,
    prepare: config.prepareStatements,
    connection: { statement_timeout: config.statementTimeoutMs }
  });

  return singletonSql;
}

/** Pooled query adapter; `connect()` reserves one connection for a manual transaction. */
export function getPool(): Queryable {
  const sql = getSql();
  return {
    query: adapt(sql),
    connect: async () => {
      const reserved = await sql.reserve();
      return { query: adapt(reserved), release: () => reserved.release() };
    }
  };
}

export function getDb(): PostgresJsDatabase<typeof schema> {
  singletonDb ??= drizzle(getSql(), { schema });
  return singletonDb;
}

export async function dbHealthcheck(): Promise<boolean> {
  const result = await getPool().query<{ ok: number }>('select 1 as ok');
  return result.rows[0]?.ok === 1;
}

export async function closeDb(): Promise<void> {
  if (singletonSql) {
    await singletonSql.end({ timeout: 5 });
    singletonSql = undefined;
    singletonDb = undefined;
  }
}
