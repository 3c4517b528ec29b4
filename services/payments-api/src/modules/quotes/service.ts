import { pairKey, type Quote } from '@fxdesk/domain';
import type { QuoteEngine } from './engine.js';
import { QuoteNotFoundError } from './errors.js';
import type { CurrencyListing, IssueQuoteInput, QuoteListFilter, QuoteRecord, QuoteRepositoryPort } from './types.js';

export class QuoteService {
  constructor(
    private readonly engine: QuoteEngine,
    private readonly repository: QuoteRepositoryPort
  ) {}

  async issueQuote(input: IssueQuoteInput): Promise<QuoteRecord> {
    const quote: Quote = await this.engine.request({
      sourceCurrency: input.sourceCurrency,
      targetCurrency: input.targetCurrency
    });

    await this.repository.save(quote, {
      actorType: 'user',
      actorId: input.requestedBy,
      action: 'quote_issued',
      entityType: 'fx_quote',
      entityId: quote.quoteId,
      metadata: {
        pair: pairKey(quote.pair),
        baseRate: quote.baseRate.toString(),
        finalRate: quote.finalRate.toString(),
        rateOrigin: quote.rateOrigin,
        degraded: quote.degraded
      }
    });

    return { ...quote, usedByPaymentId: null };
  }

  async getQuote(quoteId: string): Promise<QuoteRecord> {
    const quote = await this.repository.findById(quoteId);
    if (!quote) {
      throw new QuoteNotFoundError(quoteId);
    }
    return quote;
  }

  listQuotes(filter: QuoteListFilter): Promise<QuoteRecord[]> {
    return this.repository.listRecent(filter);
  }

  listCurrencies(): Promise<CurrencyListing> {
    return this.engine.listCurrencies();
  }
}
