import { Decimal } from 'decimal.js';
import {
  MockRateSource,
  RateSourceError,
  SandboxExecutionAdapter,
  type FxRate,
  type PaymentExecutionAdapter,
  type RateSource
} from '@fxdesk/adapters';
import { flatFeePolicy, roundRate, type CurrencyPair, type QuoteUsagePolicy } from '@fxdesk/domain';
import { createServiceLogger, createServiceMetrics, type LogLevel, type ServiceLogger } from '@fxdesk/observability';
import { ExecutionService, PaymentService } from '../../src/modules/payments/index.js';
import { QuoteCache, QuoteEngine, QuoteService } from '../../src/modules/quotes/index.js';
import { InMemoryAuditTrail, InMemoryPaymentRepository, InMemoryQuoteRepository } from './memory-repositories.js';

export class TestClock {
  private current: number;

  constructor(start = '2026-03-01T09:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  millis = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

type StubStep = { rate: string } | { failure: RateSourceError };

/** Rate source that answers from a script of steps, repeating the last one. */
export class StubRateSource implements RateSource {
  readonly kind = 'live' as const;
  calls = 0;
  symbolCalls = 0;
  symbols: Record<string, string> | RateSourceError = { GBP: 'British Pound Sterling', EUR: 'Euro', XAU: 'Gold (troy ounce)' };

  constructor(
    private readonly steps: StubStep[],
    private readonly clock: () => Date
  ) {}

  async fetch(pair: CurrencyPair): Promise<FxRate> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls += 1;
    if ('failure' in step) {
      throw step.failure;
    }
    return { pair, midRate: roundRate(new Decimal(step.rate)), fetchedAt: this.clock(), source: this.kind };
  }

  async listSymbols(): Promise<Record<string, string>> {
    this.symbolCalls += 1;
    if (this.symbols instanceof RateSourceError) {
      throw this.symbols;
    }
    return this.symbols;
  }
}

export interface LogLine {
  level: LogLevel;
  message: string;
  metadata: Record<string, unknown>;
}

export function captureLogger(): { logger: ServiceLogger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createServiceLogger({
    service: 'payments-api-test',
    minLevel: 'debug',
    sink: (level, message, metadata) => {
      lines.push({ level, message, metadata });
    }
  });
  return { logger, lines };
}

export interface HarnessOptions {
  source?: RateSource;
  usagePolicy?: QuoteUsagePolicy;
  adapter?: PaymentExecutionAdapter;
  clock?: TestClock;
}

export function createHarness(options: HarnessOptions = {}) {
  const clock = options.clock ?? new TestClock();
  const { logger, lines } = captureLogger();
  const metrics = createServiceMetrics('payments-api-test');
  const audit = new InMemoryAuditTrail();
  const quoteRepository = new InMemoryQuoteRepository(audit);
  const paymentRepository = new InMemoryPaymentRepository(quoteRepository, audit);
  let sequence = 0;

  const cache = new QuoteCache({ ttlMs: 30 * 60 * 1000, maxStaleMs: 24 * 3600 * 1000, symbolTtlMs: 24 * 3600 * 1000, clock: clock.millis });
  const engine = new QuoteEngine({
    source: options.source ?? new MockRateSource({ random: () => 0.5, clock: clock.now }),
    fallback: new MockRateSource({ random: () => 0.5, clock: clock.now }),
    cache,
    logger,
    metrics,
    options: { markupPct: '0.005', validitySeconds: 120, fetchTimeoutMs: 1000, maxAttempts: 3, retryBaseDelayMs: 10 },
    clock: clock.now,
    idFactory: () => `q_${++sequence}`,
    sleep: async () => undefined
  });

  const quoteService = new QuoteService(engine, quoteRepository);
  const paymentService = new PaymentService({
    repository: paymentRepository,
    quotes: quoteService,
    options: { usagePolicy: options.usagePolicy ?? 'reusable', feePolicy: flatFeePolicy('5.00') },
    logger,
    metrics,
    clock: clock.now,
    idFactory: (prefix) => `${prefix}_${++sequence}`
  });
  const executionService = new ExecutionService(paymentService, options.adapter ?? new SandboxExecutionAdapter(clock.now), logger);

  return {
    clock,
    logger,
    lines,
    metrics,
    audit,
    cache,
    engine,
    quoteRepository,
    paymentRepository,
    quoteService,
    paymentService,
    executionService
  };
}

export type Harness = ReturnType<typeof createHarness>;
