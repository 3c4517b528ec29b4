import { formatRate, rateBreakdown, secondsRemaining, isQuoteExpired } from '@fxdesk/domain';
import type { QuoteRecord } from './types.js';

export interface QuoteView {
  quoteId: string;
  sourceCurrency: string;
  targetCurrency: string;
  baseRate: string;
  markupPct: string;
  markupAmount: string;
  finalRate: string;
  inverseRate: string;
  issuedAt: string;
  expiresAt: string;
  secondsRemaining: number;
  expired: boolean;
  degraded: boolean;
  rateOrigin: string;
  rateSource: string;
  rateFetchedAt: string;
  used: boolean;
}

export function toQuoteView(quote: QuoteRecord, now: Date = new Date()): QuoteView {
  const breakdown = rateBreakdown(quote);
  return {
    quoteId: quote.quoteId,
    sourceCurrency: quote.pair.source,
    targetCurrency: quote.pair.target,
    baseRate: formatRate(breakdown.baseRate),
    markupPct: breakdown.markupPct.toString(),
    markupAmount: formatRate(breakdown.markupAmount),
    finalRate: formatRate(breakdown.finalRate),
    inverseRate: formatRate(breakdown.inverseRate),
    issuedAt: quote.issuedAt.toISOString(),
    expiresAt: quote.expiresAt.toISOString(),
    secondsRemaining: secondsRemaining(quote, now),
    expired: isQuoteExpired(quote, now),
    degraded: quote.degraded,
    rateOrigin: quote.rateOrigin,
    rateSource: quote.rateSource,
    rateFetchedAt: quote.rateFetchedAt.toISOString(),
    used: quote.usedByPaymentId !== null
  };
}
