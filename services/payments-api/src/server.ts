import { MockRateSource, SandboxExecutionAdapter, createRateSource } from '@fxdesk/adapters';
import { loadPaymentsApiServiceEnv, type PaymentsApiServiceEnv } from '@fxdesk/config';
import { closeDb, dbHealthcheck } from '@fxdesk/db';
import { createFeePolicy } from '@fxdesk/domain';
import { runServiceAndExit } from '@fxdesk/http';
import { createServiceLogger, createServiceMetrics, type ServiceLogger } from '@fxdesk/observability';
import { SERVICE_NAME, buildPaymentsApiApp, type PaymentsApiDeps } from './app.js';
import { AuditService } from './modules/audit/index.js';
import { ExecutionService, PaymentRepository, PaymentService } from './modules/payments/index.js';
import { QuoteCache, QuoteEngine, QuoteRepository, QuoteService } from './modules/quotes/index.js';

function createPaymentsApiDeps(env: PaymentsApiServiceEnv, logger: ServiceLogger): PaymentsApiDeps {
  const metrics = createServiceMetrics(SERVICE_NAME);
  const source = createRateSource({
    apiKey: env.FX_PROVIDER_API_KEY,
    baseUrl: env.FX_PROVIDER_BASE_URL,
    pivotCurrency: env.FX_PIVOT_CURRENCY
  });

  const engine = new QuoteEngine({
    source,
    fallback: new MockRateSource(),
    cache: new QuoteCache({
      ttlMs: env.FX_RATE_CACHE_TTL_MS,
      maxStaleMs: env.FX_RATE_MAX_STALE_MS,
      symbolTtlMs: env.FX_SYMBOL_CACHE_TTL_MS
    }),
    logger,
    metrics,
    options: {
      markupPct: env.FX_MARKUP_PERCENTAGE,
      validitySeconds: env.FX_QUOTE_VALIDITY_SECONDS,
      fetchTimeoutMs: env.FX_FETCH_TIMEOUT_MS,
      maxAttempts: env.FX_FETCH_MAX_ATTEMPTS,
      retryBaseDelayMs: env.FX_FETCH_RETRY_BASE_DELAY_MS
    }
  });

  const quoteService = new QuoteService(engine, new QuoteRepository(undefined, logger));
  const paymentService = new PaymentService({
    repository: new PaymentRepository(undefined, logger),
    quotes: quoteService,
    options: {
      usagePolicy: env.QUOTE_USAGE_POLICY,
      feePolicy: createFeePolicy({
        kind: env.PAYMENT_FEE_POLICY,
        flatFee: env.PAYMENT_FLAT_FEE,
        rate: env.PAYMENT_FEE_RATE
      })
    },
    logger,
    metrics
  });

  logger.info('FX rate source selected', { source: source.kind, pivot: env.FX_PIVOT_CURRENCY });
  logger.info('Payment fee policy selected', { policy: env.PAYMENT_FEE_POLICY });

  return {
    quoteService,
    paymentService,
    executionService: new ExecutionService(paymentService, new SandboxExecutionAdapter(), logger),
    auditTrail: new AuditService(),
    logger,
    metrics,
    readiness: async () => {
      try {
        return await dbHealthcheck();
      } catch (error) {
        logger.warn('Database readiness check failed', { error: error instanceof Error ? error.message : String(error) });
        return false;
      }
    }
  };
}

const logger = createServiceLogger({ service: SERVICE_NAME });

runServiceAndExit({
  serviceName: SERVICE_NAME,
  logger,
  loadEnv: () => loadPaymentsApiServiceEnv(),
  listenOn: (env) => ({ port: env.PAYMENTS_API_PORT, host: env.PAYMENTS_API_HOST }),
  buildApp: async (env) => buildPaymentsApiApp(createPaymentsApiDeps(env, logger)),
  onShutdown: closeDb
});
