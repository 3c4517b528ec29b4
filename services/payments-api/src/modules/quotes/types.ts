import type { AuditEntry } from '@fxdesk/http';
import type { Quote, RateOrigin } from '@fxdesk/domain';

export interface QuoteRecord extends Quote {
  /** Set once when a payment claims the quote under the single-use policy. */
  usedByPaymentId: string | null;
}

export interface QuoteRepositoryPort {
  /** Persists the quote and its issuance audit entry together. */
  save(quote: Quote, audit: AuditEntry): Promise<void>;
  findById(quoteId: string): Promise<QuoteRecord | null>;
  /** Most recently issued first; with `activeAt`, only quotes still valid at that instant. */
  listRecent(filter: QuoteListFilter): Promise<QuoteRecord[]>;
}

export interface QuoteListFilter {
  activeAt?: Date;
  limit: number;
}

export interface IssueQuoteInput {
  sourceCurrency: string;
  targetCurrency: string;
  requestedBy: string;
}

export interface CurrencyListing {
  currencies: Array<{ code: string; name: string; decimals: number }>;
  origin: Exclude<RateOrigin, 'fallback'> | 'registry';
  degraded: boolean;
}
