export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  metadata: Record<string, unknown>;
}

// Errors serialise to `{}` by default.
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  metadata: Record<string, unknown> = {},
  now: Date = new Date()
): string {
  const entry: LogEntry = { timestamp: now.toISOString(), level, message, metadata };
  return JSON.stringify(entry, replacer);
}

/** One JSON line per entry; warnings and errors go to stderr. */
export function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  const line = `${formatLogEntry(level, message, metadata)}\n`;
  if (level === 'info') {
    process.stdout.write(line);
    return;
  }
  process.stderr.write(line);
}
