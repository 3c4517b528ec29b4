import { randomUUID } from 'node:crypto';
import {
  RateSourceError,
  isRetryableFailure,
  type FxRate,
  type RateSource,
  type RateSourceFailure
} from '@fxdesk/adapters';
import {
  computeFinalRate,
  getCurrency,
  listCurrencies,
  pairKey,
  parseCurrencyPair,
  parseMarkup,
  withRetry,
  withTimeout,
  type CurrencyPair,
  type Quote,
  type RateOrigin
} from '@fxdesk/domain';
import type { ServiceLogger, ServiceMetrics } from '@fxdesk/observability';
import type { Decimal } from 'decimal.js';
import type { QuoteCache } from './cache.js';
import type { CurrencyListing } from './types.js';

export interface QuoteEngineOptions {
  markupPct: Decimal.Value;
  validitySeconds: number;
  fetchTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface QuoteEngineDeps {
  /** Active upstream, chosen once at startup. */
  source: RateSource;
  /** Synthetic source used when neither upstream nor cache can answer. */
  fallback: RateSource;
  cache: QuoteCache;
  logger: ServiceLogger;
  metrics?: Pick<ServiceMetrics, 'quotesIssued' | 'rateSourceFailures'>;
  options: QuoteEngineOptions;
  clock?: () => Date;
  idFactory?: () => string;
  sleep?: (ms: number) => Promise<void>;
}

export interface QuoteRequest {
  sourceCurrency: string;
  targetCurrency: string;
  markupPct?: Decimal.Value;
}

interface ResolvedRate {
  rate: FxRate;
  origin: RateOrigin;
}

function failureOf(error: unknown): RateSourceFailure {
  return error instanceof RateSourceError ? error.failure : 'unavailable';
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Turns a currency pair into a priced, time-boxed quote.
 *
 * Rate resolution order: fresh cache, active source (bounded retries, each
 * attempt under a timeout), stale cache, synthetic fallback. Upstream
 * trouble only ever degrades the quote; it is logged and counted here and
 * never reaches the caller.
 */
export class QuoteEngine {
  private readonly clock: () => Date;
  private readonly idFactory: () => string;
  private readonly defaultMarkup: Decimal;

  constructor(private readonly deps: QuoteEngineDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.idFactory = deps.idFactory ?? (() => `q_${randomUUID()}`);
    this.defaultMarkup = parseMarkup(deps.options.markupPct);
  }

  get sourceKind(): RateSource['kind'] {
    return this.deps.source.kind;
  }

  async request(input: QuoteRequest): Promise<Quote> {
    const pair = parseCurrencyPair(input.sourceCurrency, input.targetCurrency);
    const markupPct = input.markupPct === undefined ? this.defaultMarkup : parseMarkup(input.markupPct);

    const { rate, origin } = await this.resolveRate(pair);
    const finalRate = computeFinalRate(rate.midRate, markupPct);
    const issuedAt = this.clock();
    const degraded = origin === 'stale_cache' || origin === 'fallback';

    const quote: Quote = {
      quoteId: this.idFactory(),
      pair,
      baseRate: rate.midRate,
      markupPct,
      finalRate,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + this.deps.options.validitySeconds * 1000),
      degraded,
      rateOrigin: origin,
      rateSource: rate.source,
      rateFetchedAt: rate.fetchedAt
    };

    this.deps.metrics?.quotesIssued.labels(origin, String(degraded)).inc();
    this.deps.logger.info('FX quote issued', {
      quoteId: quote.quoteId,
      pair: pairKey(pair),
      finalRate: finalRate.toString(),
      rateOrigin: origin,
      degraded
    });

    return quote;
  }

  async listCurrencies(): Promise<CurrencyListing> {
    const fresh = this.deps.cache.getSymbols();
    if (fresh) {
      return this.toListing(fresh, 'cache', false);
    }

    try {
      const symbols = await withTimeout(
        (signal) => this.deps.source.listSymbols({ signal }),
        this.deps.options.fetchTimeoutMs,
        () => new RateSourceError('network', `Symbol fetch timed out after ${this.deps.options.fetchTimeoutMs}ms.`)
      );
      this.deps.cache.putSymbols(symbols);
      return this.toListing(symbols, 'source', false);
    } catch (error) {
      this.recordFailure('symbols', error);
    }

    const stale = this.deps.cache.peekSymbols();
    if (stale) {
      return this.toListing(stale.value, 'stale_cache', true);
    }

    return {
      currencies: listCurrencies().map(({ code, name, decimals }) => ({ code, name, decimals })),
      origin: 'registry',
      degraded: true
    };
  }

  private async resolveRate(pair: CurrencyPair): Promise<ResolvedRate> {
    const cached = this.deps.cache.get(pair);
    if (cached) {
      return { rate: cached, origin: 'cache' };
    }

    try {
      const rate = await this.fetchFromSource(pair);
      this.deps.cache.put(pair, rate);
      return { rate, origin: 'source' };
    } catch (error) {
      this.recordFailure(pairKey(pair), error);
    }

    const stale = this.deps.cache.peek(pair);
    if (stale) {
      this.deps.logger.warn('Serving stale FX rate', { pair: pairKey(pair), ageMs: stale.ageMs });
      return { rate: stale.value, origin: 'stale_cache' };
    }

    const rate = await this.deps.fallback.fetch(pair);
    this.deps.logger.warn('Serving synthetic FX rate', { pair: pairKey(pair), source: rate.source });
    return { rate, origin: 'fallback' };
  }

  private async fetchFromSource(pair: CurrencyPair): Promise<FxRate> {
    const { fetchTimeoutMs, maxAttempts, retryBaseDelayMs } = this.deps.options;

    const result = await withRetry(
      () =>
        withTimeout(
          (signal) => this.deps.source.fetch(pair, { signal }),
          fetchTimeoutMs,
          () => new RateSourceError('network', `Rate fetch timed out after ${fetchTimeoutMs}ms.`)
        ),
      {
        maxAttempts,
        baseDelayMs: retryBaseDelayMs,
        maxDelayMs: fetchTimeoutMs,
        isRetryable: isRetryableFailure,
        sleep: this.deps.sleep,
        onRetry: (attempt, error, delayMs) => {
          this.deps.logger.debug('Retrying FX rate fetch', {
            pair: pairKey(pair),
            attempt,
            delayMs,
            failure: failureOf(error)
          });
        }
      }
    );

    return result.value;
  }

  private recordFailure(subject: string, error: unknown): void {
    const failure = failureOf(error);
    this.deps.metrics?.rateSourceFailures.labels(failure).inc();
    this.deps.logger.warn('FX rate source failed, degrading', {
      subject,
      source: this.deps.source.kind,
      failure,
      error: messageOf(error)
    });
  }

  private toListing(symbols: Record<string, string>, origin: CurrencyListing['origin'], degraded: boolean): CurrencyListing {
    const currencies = Object.entries(symbols)
      .map(([code, name]) => {
        const known = getCurrency(code);
        return known ? { code: known.code, name, decimals: known.decimals } : undefined;
      })
      .filter((entry): entry is CurrencyListing['currencies'][number] => entry !== undefined)
      .sort((a, b) => a.code.localeCompare(b.code));

    return { currencies, origin, degraded };
  }
}
