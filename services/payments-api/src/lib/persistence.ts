import type { QueryClient, Queryable } from '@fxdesk/db';
import { PersistenceError, isErrorCode } from '@fxdesk/domain';
import type { ServiceLogger } from '@fxdesk/observability';

/**
 * Domain errors raised inside a transaction pass through unchanged; any
 * other failure is a store fault and is reported generically.
 */
export function asPersistenceError(operation: string, error: unknown): Error {
  const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
  if (error instanceof Error && isErrorCode(code)) {
    return error;
  }
  return new PersistenceError(operation, error);
}

/**
 * Runs `work` between `begin` and `commit` on one reserved connection.
 * Every failure, including reserving the connection, surfaces through
 * `asPersistenceError`; a failed rollback is logged and the original error
 * is kept.
 */
export async function inTransaction<T>(
  pool: Queryable,
  operation: string,
  logger: ServiceLogger,
  work: (client: QueryClient) => Promise<T>
): Promise<T> {
  let client: QueryClient | undefined;
  try {
    client = await pool.connect();
    await client.query('begin');
    const result = await work(client);
    await client.query('commit');
    return result;
  } catch (error) {
    if (client) {
      await client.query('rollback').catch((rollbackError: unknown) => {
        logger.error('Transaction rollback failed', {
          operation,
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
        });
      });
    }
    throw asPersistenceError(operation, error);
  } finally {
    client?.release();
  }
}
