export class QuoteNotFoundError extends Error {
  readonly code = 'QUOTE_NOT_FOUND';

  constructor(quoteId: string) {
    super(`Quote ${quoteId} was not found.`);
    this.name = 'QuoteNotFoundError';
  }
}

export class QuoteAlreadyUsedError extends Error {
  readonly code = 'QUOTE_ALREADY_USED';

  constructor(quoteId: string) {
    super(`Quote ${quoteId} has already been used by another payment.`);
    this.name = 'QuoteAlreadyUsedError';
  }
}
