export interface MigrationPlan {
  /** Files still to apply, in version order. */
  pending: string[];
  /** Versions recorded as applied that no longer exist on disk. */
  missing: string[];
}

/** Migration files are applied in lexical order of their names, e.g. `0001_fx_quotes_payments.sql`. */
export function planMigrations(files: readonly string[], applied: readonly string[]): MigrationPlan {
  const done = new Set(applied);
  const sqlFiles = files.filter((file) => file.endsWith('.sql')).sort((a, b) => a.localeCompare(b));
  const onDisk = new Set(sqlFiles);

  return {
    pending: sqlFiles.filter((file) => !done.has(file)),
    missing: applied.filter((version) => !onDisk.has(version))
  };
}
