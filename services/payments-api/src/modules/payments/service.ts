import { randomUUID } from 'node:crypto';
import {
  buildPayment,
  formatAmount,
  formatRate,
  planTransition,
  userActor,
  type Actor,
  type ApprovalEvent,
  type FeePolicy,
  type Payment,
  type PaymentAction,
  type QuoteUsagePolicy
} from '@fxdesk/domain';
import type { ServiceLogger, ServiceMetrics } from '@fxdesk/observability';
import { QuoteAlreadyUsedError } from '../quotes/errors.js';
import type { QuoteRecord } from '../quotes/types.js';
import { PaymentNotFoundError } from './errors.js';
import type { CreateDraftInput, PaymentListFilter, PaymentRepositoryPort, TransitionOptions, TransitionRecords } from './types.js';

export interface QuoteLookup {
  getQuote(quoteId: string): Promise<QuoteRecord>;
}

export interface PaymentServiceOptions {
  usagePolicy: QuoteUsagePolicy;
  feePolicy: FeePolicy;
}

export interface PaymentServiceDeps {
  repository: PaymentRepositoryPort;
  quotes: QuoteLookup;
  options: PaymentServiceOptions;
  logger?: ServiceLogger;
  metrics?: Pick<ServiceMetrics, 'paymentTransitions'>;
  clock?: () => Date;
  idFactory?: (prefix: string) => string;
}

export class PaymentService {
  private readonly clock: () => Date;
  private readonly idFactory: (prefix: string) => string;

  constructor(private readonly deps: PaymentServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.idFactory = deps.idFactory ?? ((prefix) => `${prefix}_${randomUUID()}`);
  }

  async createDraft(input: CreateDraftInput): Promise<Payment> {
    const quote = await this.deps.quotes.getQuote(input.quoteId);
    const claimQuote = this.deps.options.usagePolicy === 'single_use';

    if (claimQuote && quote.usedByPaymentId !== null) {
      throw new QuoteAlreadyUsedError(quote.quoteId);
    }

    const payment = buildPayment({
      paymentId: this.idFactory('pay'),
      quote,
      direction: input.direction,
      amount: input.amount,
      feePolicy: this.deps.options.feePolicy,
      createdBy: input.createdBy,
      reference: input.reference,
      now: this.clock()
    });

    const created = await this.deps.repository.create({
      payment,
      claimQuote,
      audit: {
        actorType: 'user',
        actorId: input.createdBy,
        action: 'payment_created',
        entityType: 'payment',
        entityId: payment.paymentId,
        metadata: {
          quoteId: quote.quoteId,
          direction: payment.direction,
          sourceAmount: formatAmount(payment.sourceAmount, payment.sourceCurrency),
          targetAmount: formatAmount(payment.targetAmount, payment.targetCurrency),
          feeAmount: formatAmount(payment.feeAmount, payment.sourceCurrency),
          totalDebit: formatAmount(payment.totalDebit, payment.sourceCurrency),
          fxRate: formatRate(payment.fxRate)
        }
      }
    });

    this.deps.logger?.info('Payment draft created', {
      paymentId: created.paymentId,
      quoteId: quote.quoteId,
      createdBy: created.createdBy
    });

    return created;
  }

  async getPayment(paymentId: string): Promise<Payment> {
    const payment = await this.deps.repository.findById(paymentId);
    if (!payment) {
      throw new PaymentNotFoundError(paymentId);
    }
    return payment;
  }

  listPayments(filter: PaymentListFilter): Promise<Payment[]> {
    return this.deps.repository.list(filter);
  }

  async listEvents(paymentId: string): Promise<ApprovalEvent[]> {
    await this.getPayment(paymentId);
    return this.deps.repository.listEvents(paymentId);
  }

  submit(paymentId: string, actorId: string): Promise<Payment> {
    return this.applyAction(paymentId, 'submit', userActor(actorId));
  }

  approve(paymentId: string, actorId: string, comment?: string): Promise<Payment> {
    return this.applyAction(paymentId, 'approve', userActor(actorId), { comment });
  }

  reject(paymentId: string, actorId: string, comment?: string): Promise<Payment> {
    return this.applyAction(paymentId, 'reject', userActor(actorId), { comment });
  }

  /**
   * Apply one state-machine action atomically. The decision is made against
   * the row as locked by the repository, so a concurrent transition on the
   * same payment either lands first and invalidates this one or waits.
   */
  async applyAction(paymentId: string, action: PaymentAction, actor: Actor, options: TransitionOptions = {}): Promise<Payment> {
    const records = await this.deps.repository.applyTransition(paymentId, (current) =>
      this.buildTransition(current, action, actor, options)
    );

    this.deps.metrics?.paymentTransitions.labels(action, records.event.toStatus).inc();
    this.deps.logger?.info('Payment transition applied', {
      paymentId,
      action,
      actorId: records.event.actorId,
      fromStatus: records.event.fromStatus,
      toStatus: records.event.toStatus
    });

    return records.payment;
  }

  private buildTransition(current: Payment, action: PaymentAction, actor: Actor, options: TransitionOptions): TransitionRecords {
    const planned = planTransition(current, action, actor);
    const now = this.clock();
    const comment = options.comment?.trim() ? options.comment.trim() : null;

    const payment: Payment = {
      ...current,
      status: planned.to,
      externalReference: options.externalReference ?? current.externalReference,
      failureReason: options.failureReason ?? current.failureReason,
      version: current.version + 1,
      updatedAt: now
    };

    const event: ApprovalEvent = {
      eventId: this.idFactory('evt'),
      paymentId: current.paymentId,
      actorId: planned.actorId,
      action,
      fromStatus: planned.from,
      toStatus: planned.to,
      comment,
      createdAt: now
    };

    const metadata: Record<string, unknown> = { fromStatus: planned.from, toStatus: planned.to };
    if (options.externalReference) {
      metadata.externalReference = options.externalReference;
    }

    return {
      payment,
      event,
      audit: {
        actorType: actor.kind,
        actorId: planned.actorId,
        action: `payment_${action}`,
        entityType: 'payment',
        entityId: current.paymentId,
        reason: comment ?? options.failureReason,
        metadata
      }
    };
  }
}
