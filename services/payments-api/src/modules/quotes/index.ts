export { QuoteCache, type QuoteCacheOptions, type StaleEntry } from './cache.js';
export { QuoteEngine, type QuoteEngineDeps, type QuoteEngineOptions, type QuoteRequest } from './engine.js';
export { QuoteAlreadyUsedError, QuoteNotFoundError } from './errors.js';
export { QuoteRepository, mapQuoteRow } from './repository.js';
export { QuoteService } from './service.js';
export type { CurrencyListing, IssueQuoteInput, QuoteListFilter, QuoteRecord, QuoteRepositoryPort } from './types.js';
export { toQuoteView, type QuoteView } from './view.js';
