import { allowedActions, formatAmount, formatRate, type ApprovalEvent, type Payment } from '@fxdesk/domain';

export interface PaymentView {
  paymentId: string;
  quoteId: string | null;
  direction: string;
  sourceCurrency: string;
  targetCurrency: string;
  sourceAmount: string;
  targetAmount: string;
  fxRate: string;
  feeAmount: string;
  totalDebit: string;
  status: string;
  allowedActions: string[];
  createdBy: string;
  reference: string | null;
  externalReference: string | null;
  failureReason: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface ApprovalEventView {
  eventId: string;
  actorId: string;
  action: string;
  fromStatus: string;
  toStatus: string;
  comment: string | null;
  createdAt: string;
}

export function toPaymentView(payment: Payment): PaymentView {
  return {
    paymentId: payment.paymentId,
    quoteId: payment.quoteId,
    direction: payment.direction,
    sourceCurrency: payment.sourceCurrency,
    targetCurrency: payment.targetCurrency,
    sourceAmount: formatAmount(payment.sourceAmount, payment.sourceCurrency),
    targetAmount: formatAmount(payment.targetAmount, payment.targetCurrency),
    fxRate: formatRate(payment.fxRate),
    feeAmount: formatAmount(payment.feeAmount, payment.sourceCurrency),
    totalDebit: formatAmount(payment.totalDebit, payment.sourceCurrency),
    status: payment.status,
    allowedActions: allowedActions(payment.status),
    createdBy: payment.createdBy,
    reference: payment.reference,
    externalReference: payment.externalReference,
    failureReason: payment.failureReason,
    version: payment.version,
    createdAt: payment.createdAt.toISOString(),
    updatedAt: payment.updatedAt.toISOString()
  };
}

export function toApprovalEventView(event: ApprovalEvent): ApprovalEventView {
  return {
    eventId: event.eventId,
    actorId: event.actorId,
    action: event.action,
    fromStatus: event.fromStatus,
    toStatus: event.toStatus,
    comment: event.comment,
    createdAt: event.createdAt.toISOString()
  };
}
