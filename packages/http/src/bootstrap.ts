import type { ServiceLogger } from '@fxdesk/observability';
import type { FastifyInstance } from 'fastify';

export interface ListenAddress {
  port: number;
  host: string;
}

export interface ServiceBootstrapOptions<Env> {
  serviceName: string;
  logger: ServiceLogger;
  /** Parses and validates the environment; a throw aborts startup. */
  loadEnv: () => Env;
  listenOn: (env: Env) => ListenAddress;
  buildApp: (env: Env) => Promise<FastifyInstance>;
  onShutdown?: () => Promise<void> | void;
}

export interface RunningService {
  app: FastifyInstance;
  address: ListenAddress;
  shutdown: (signal: string) => Promise<void>;
}

export async function runService<Env>(options: ServiceBootstrapOptions<Env>): Promise<RunningService> {
  const env = options.loadEnv();
  const address = options.listenOn(env);
  const app = await options.buildApp(env);

  await app.listen(address);
  options.logger.info(`${options.serviceName} listening`, { ...address });

  let closing: Promise<void> | undefined;
  const shutdown = (signal: string): Promise<void> => {
    closing ??= (async () => {
      options.logger.warn(`${options.serviceName} shutting down`, { signal });
      await app.close();
      await options.onShutdown?.();
    })();
    return closing;
  };

  return { app, address, shutdown };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Starts the service and wires SIGINT/SIGTERM; any startup or shutdown failure exits non-zero. */
export function runServiceAndExit<Env>(options: ServiceBootstrapOptions<Env>): void {
  const stopOn = (running: RunningService, signal: string): void => {
    running.shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        options.logger.error(`${options.serviceName} shutdown failed`, { error: describeError(error) });
        process.exit(1);
      }
    );
  };

  runService(options).then(
    (running) => {
      process.once('SIGINT', () => stopOn(running, 'SIGINT'));
      process.once('SIGTERM', () => stopOn(running, 'SIGTERM'));
    },
    (error: unknown) => {
      options.logger.error(`${options.serviceName} failed to start`, { error: describeError(error) });
      process.exit(1);
    }
  );
}
