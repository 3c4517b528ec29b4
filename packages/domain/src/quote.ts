import { Decimal } from 'decimal.js';
import { pairKey, type CurrencyPair } from './currency.js';
import { ValidationError } from './errors.js';
import { roundRate, toDecimal } from './money.js';

/**
 * Where the base rate of a quote came from. Only `cache` and `source` are
 * healthy; the other two mark the quote degraded.
 */
export const RATE_ORIGINS = ['cache', 'source', 'stale_cache', 'fallback'] as const;
export type RateOrigin = (typeof RATE_ORIGINS)[number];

export const QUOTE_USAGE_POLICIES = ['reusable', 'single_use'] as const;
export type QuoteUsagePolicy = (typeof QUOTE_USAGE_POLICIES)[number];

export interface Quote {
  quoteId: string;
  pair: CurrencyPair;
  baseRate: Decimal;
  markupPct: Decimal;
  finalRate: Decimal;
  issuedAt: Date;
  expiresAt: Date;
  degraded: boolean;
  rateOrigin: RateOrigin;
  /** Identity of the rate source that produced the base rate (`live` or `mock`). */
  rateSource: string;
  rateFetchedAt: Date;
}

export interface RateBreakdown {
  currencyPair: string;
  baseRate: Decimal;
  markupPct: Decimal;
  markupAmount: Decimal;
  finalRate: Decimal;
  inverseRate: Decimal;
}

export function parseMarkup(value: Decimal.Value): Decimal {
  const markup = toDecimal(value, 'markupPct');
  if (markup.isNegative() || markup.gte(1)) {
    throw new ValidationError('markupPct must be at least 0 and below 1.', { markupPct: markup.toString() });
  }
  return markup;
}

/** finalRate = baseRate × (1 + markupPct), kept at rate precision. */
export function computeFinalRate(baseRate: Decimal, markupPct: Decimal): Decimal {
  if (baseRate.lte(0)) {
    throw new ValidationError('Base rate must be positive.', { baseRate: baseRate.toString() });
  }
  return roundRate(baseRate.times(markupPct.plus(1)));
}

export function isQuoteExpired(quote: Pick<Quote, 'expiresAt'>, now: Date = new Date()): boolean {
  return quote.expiresAt.getTime() <= now.getTime();
}

export function secondsRemaining(quote: Pick<Quote, 'expiresAt'>, now: Date = new Date()): number {
  return Math.max(0, Math.floor((quote.expiresAt.getTime() - now.getTime()) / 1000));
}

export function rateBreakdown(quote: Quote): RateBreakdown {
  return {
    currencyPair: pairKey(quote.pair),
    baseRate: quote.baseRate,
    markupPct: quote.markupPct,
    markupAmount: roundRate(quote.baseRate.times(quote.markupPct)),
    finalRate: quote.finalRate,
    inverseRate: roundRate(new Decimal(1).dividedBy(quote.finalRate))
  };
}
