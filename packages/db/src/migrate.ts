import { loadRuntimeConfig } from '@fxdesk/config';
import { createServiceLogger } from '@fxdesk/observability';
import { readFile, readdir } from 'node:fs/promises';
import postgres from 'postgres';
import { planMigrations } from './migrations.js';
import { loadDbConfig } from './pool-config.js';

const MIGRATIONS_DIR = new URL('../migrations/', import.meta.url);

const logger = createServiceLogger({ service: 'db-migrate', minLevel: 'info' });

async function runMigrations(): Promise<void> {
  const runtime = loadRuntimeConfig();
  const dbConfig = loadDbConfig();
  const sql = postgres(runtime.DATABASE_URL, {
    max: 1,
    connect_timeout: dbConfig.connectTimeoutSeconds,
    prepare: false
  });

  try {
    await sql.unsafe(`
      create table if not exists schema_migrations (
        version text primary key,
        applied_at timestamptz not null default now()
      )
    `);

    const applied = await sql<{ version: string }[]>`select version from schema_migrations order by version`;
    const plan = planMigrations(
      await readdir(MIGRATIONS_DIR),
      applied.map((row) => row.version)
    );

    if (plan.missing.length > 0) {
      logger.warn('Applied migrations missing from disk', { versions: plan.missing });
    }

    for (const filename of plan.pending) {
      const migrationSql = await readFile(new URL(filename, MIGRATIONS_DIR), 'utf8');
      await sql.begin(async (transaction) => {
        await transaction.unsafe(migrationSql);
        await transaction.unsafe('insert into schema_migrations (version) values ($1)', [filename]);
      });
      logger.info('Applied migration', { filename });
    }

    logger.info('Migration run complete', { applied: plan.pending.length });
  } finally {
    await sql.end({ timeout: 5 });
  }
}

runMigrations().catch((error: unknown) => {
  logger.error('Migration run failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
