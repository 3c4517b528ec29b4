import type { ApprovalEvent, Payment, PaymentDirection, PaymentStatus } from '@fxdesk/domain';
import type { AuditEntry } from '@fxdesk/http';

/** Everything one accepted transition writes, committed together. */
export interface TransitionRecords {
  payment: Payment;
  event: ApprovalEvent;
  audit: AuditEntry;
}

/** Decides the next records from the locked current row, or throws to abort. */
export type TransitionFn = (current: Payment) => TransitionRecords;

export interface CreatePaymentRecords {
  payment: Payment;
  audit: AuditEntry;
  /** Claim the payment's quote in the same transaction; fails if already claimed. */
  claimQuote: boolean;
}

export interface PaymentRepositoryPort {
  create(records: CreatePaymentRecords): Promise<Payment>;
  findById(paymentId: string): Promise<Payment | null>;
  /** Newest first. `currency` matches either side of the payment. */
  list(filter: PaymentListFilter): Promise<Payment[]>;
  /** Events for the payment in the order they were appended. */
  listEvents(paymentId: string): Promise<ApprovalEvent[]>;
  /**
   * Runs `transition` against the current row under a per-payment lock and
   * persists the result atomically. Unknown ids reject with PaymentNotFoundError.
   */
  applyTransition(paymentId: string, transition: TransitionFn): Promise<TransitionRecords>;
}

export interface PaymentListFilter {
  status?: PaymentStatus;
  createdBy?: string;
  currency?: string;
  limit: number;
}

export interface CreateDraftInput {
  quoteId: string;
  direction: PaymentDirection;
  amount: string;
  createdBy: string;
  reference?: string;
}

export interface TransitionOptions {
  comment?: string;
  externalReference?: string;
  failureReason?: string;
}

export const EXECUTION_OUTCOMES = ['submitted', 'completed', 'failed'] as const;
export type ExecutionOutcome = (typeof EXECUTION_OUTCOMES)[number];
