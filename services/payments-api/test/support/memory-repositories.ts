import type { ApprovalEvent, Payment, Quote } from '@fxdesk/domain';
import type { AuditEntry } from '@fxdesk/http';
import type { AuditRecord, AuditTrailPort } from '../../src/modules/audit/index.js';
import {
  PaymentNotFoundError,
  type CreatePaymentRecords,
  type PaymentListFilter,
  type PaymentRepositoryPort,
  type TransitionFn,
  type TransitionRecords
} from '../../src/modules/payments/index.js';
import {
  QuoteAlreadyUsedError,
  type QuoteListFilter,
  type QuoteRecord,
  type QuoteRepositoryPort
} from '../../src/modules/quotes/index.js';

export class InMemoryAuditTrail implements AuditTrailPort {
  readonly entries: AuditRecord[] = [];

  append(entry: AuditEntry, createdAt: Date): void {
    this.entries.push({
      id: this.entries.length + 1,
      actorType: entry.actorType,
      actorId: entry.actorId,
      action: entry.action,
      entityType: entry.entityType,
      entityId: entry.entityId,
      reason: entry.reason ?? null,
      metadata: entry.metadata ?? null,
      createdAt
    });
  }

  async findByEntity(entityType: string, entityId: string): Promise<AuditRecord[]> {
    return this.entries.filter((entry) => entry.entityType === entityType && entry.entityId === entityId);
  }
}

export class InMemoryQuoteRepository implements QuoteRepositoryPort {
  readonly quotes = new Map<string, QuoteRecord>();

  constructor(private readonly audit: InMemoryAuditTrail) {}

  async save(quote: Quote, audit: AuditEntry): Promise<void> {
    this.quotes.set(quote.quoteId, { ...quote, usedByPaymentId: null });
    this.audit.append(audit, quote.issuedAt);
  }

  async findById(quoteId: string): Promise<QuoteRecord | null> {
    return this.quotes.get(quoteId) ?? null;
  }

  async listRecent(filter: QuoteListFilter): Promise<QuoteRecord[]> {
    const { activeAt } = filter;
    return [...this.quotes.values()]
      .reverse()
      .filter((quote) => !activeAt || quote.expiresAt.getTime() > activeAt.getTime())
      .sort((a, b) => b.issuedAt.getTime() - a.issuedAt.getTime())
      .slice(0, filter.limit);
  }
}

/**
 * Payment store with the same atomicity as the Postgres repository:
 * transitions on one payment run one at a time through a promise chain, and
 * each commits its payment, event and audit entry together or not at all.
 */
export class InMemoryPaymentRepository implements PaymentRepositoryPort {
  readonly payments = new Map<string, Payment>();
  readonly events: ApprovalEvent[] = [];
  /** When set, the next write fails after the decision and before anything is stored. */
  failNextWrite: Error | undefined;
  private readonly chains = new Map<string, Promise<unknown>>();

  constructor(
    private readonly quotes: InMemoryQuoteRepository,
    private readonly audit: InMemoryAuditTrail
  ) {}

  async create(records: CreatePaymentRecords): Promise<Payment> {
    const { payment } = records;
    this.throwIfFailing();

    if (records.claimQuote && payment.quoteId) {
      const quote = this.quotes.quotes.get(payment.quoteId);
      if (!quote || quote.usedByPaymentId !== null) {
        throw new QuoteAlreadyUsedError(payment.quoteId);
      }
      this.quotes.quotes.set(quote.quoteId, { ...quote, usedByPaymentId: payment.paymentId });
    }

    this.payments.set(payment.paymentId, payment);
    this.audit.append(records.audit, payment.createdAt);
    return payment;
  }

  async findById(paymentId: string): Promise<Payment | null> {
    return this.payments.get(paymentId) ?? null;
  }

  async list(filter: PaymentListFilter): Promise<Payment[]> {
    return [...this.payments.values()]
      .reverse()
      .filter((payment) => !filter.status || payment.status === filter.status)
      .filter((payment) => !filter.createdBy || payment.createdBy === filter.createdBy)
      .filter(
        (payment) => !filter.currency || payment.sourceCurrency === filter.currency || payment.targetCurrency === filter.currency
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, filter.limit);
  }

  async listEvents(paymentId: string): Promise<ApprovalEvent[]> {
    return this.events.filter((event) => event.paymentId === paymentId);
  }

  applyTransition(paymentId: string, transition: TransitionFn): Promise<TransitionRecords> {
    const previous = this.chains.get(paymentId) ?? Promise.resolve();
    const next = previous
      .then(
        () => undefined,
        () => undefined
      )
      .then(async () => {
        // Yield so callers racing on the same payment interleave as they would against a database.
        await Promise.resolve();

        const current = this.payments.get(paymentId);
        if (!current) {
          throw new PaymentNotFoundError(paymentId);
        }

        const records = transition(current);
        this.throwIfFailing();

        this.payments.set(paymentId, records.payment);
        this.events.push(records.event);
        this.audit.append(records.audit, records.event.createdAt);
        return records;
      });

    this.chains.set(paymentId, next);
    return next;
  }

  private throwIfFailing(): void {
    const failure = this.failNextWrite;
    if (failure) {
      this.failNextWrite = undefined;
      throw failure;
    }
  }
}
