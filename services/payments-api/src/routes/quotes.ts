import { z } from 'zod';
import { toQuoteView, type CurrencyListing, type QuoteService, type QuoteView } from '../modules/quotes/index.js';

const issueQuotePayloadSchema = z.object({
  sourceCurrency: z.string().trim().min(1),
  targetCurrency: z.string().trim().min(1)
});

const listQuotesQuerySchema = z.object({
  active: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  limit: z.coerce.number().int().min(1).max(200).default(20)
});

interface HttpResult<T> {
  status: number;
  body: T;
}

export function buildQuoteRoutes(service: QuoteService, clock: () => Date = () => new Date()) {
  return {
    issue: async (payload: unknown, actorId: string): Promise<HttpResult<QuoteView>> => {
      const input = issueQuotePayloadSchema.parse(payload);
      const quote = await service.issueQuote({ ...input, requestedBy: actorId });
      return { status: 201, body: toQuoteView(quote, clock()) };
    },

    get: async (quoteId: string): Promise<HttpResult<QuoteView>> => {
      const quote = await service.getQuote(quoteId);
      return { status: 200, body: toQuoteView(quote, clock()) };
    },

    list: async (query: unknown): Promise<HttpResult<{ quotes: QuoteView[] }>> => {
      const { active, limit } = listQuotesQuerySchema.parse(query);
      const now = clock();
      const quotes = await service.listQuotes({ activeAt: active ? now : undefined, limit });
      return { status: 200, body: { quotes: quotes.map((quote) => toQuoteView(quote, now)) } };
    },

    currencies: async (): Promise<HttpResult<CurrencyListing>> => ({
      status: 200,
      body: await service.listCurrencies()
    })
  };
}
