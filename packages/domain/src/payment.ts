import { Decimal } from 'decimal.js';
import { minorUnits } from './currency.js';
import { ValidationError, QuoteExpiredError } from './errors.js';
import type { FeePolicy } from './fees.js';
import { roundToMinorUnits, toPositiveDecimal } from './money.js';
import { isQuoteExpired, type Quote } from './quote.js';

export const PAYMENT_STATUSES = [
  'draft',
  'pending_approval',
  'approved',
  'rejected',
  'submitted',
  'processing',
  'completed',
  'failed'
] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const TERMINAL_PAYMENT_STATUSES: ReadonlySet<PaymentStatus> = new Set(['rejected', 'completed', 'failed']);

export const PAYMENT_DIRECTIONS = ['send', 'receive'] as const;
export type PaymentDirection = (typeof PAYMENT_DIRECTIONS)[number];

export interface Payment {
  paymentId: string;
  quoteId: string | null;
  sourceCurrency: string;
  targetCurrency: string;
  direction: PaymentDirection;
  sourceAmount: Decimal;
  targetAmount: Decimal;
  fxRate: Decimal;
  feeAmount: Decimal;
  totalDebit: Decimal;
  status: PaymentStatus;
  createdBy: string;
  reference: string | null;
  externalReference: string | null;
  failureReason: string | null;
  /** Incremented by every accepted transition; used as an optimistic guard. */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface BuildPaymentInput {
  paymentId: string;
  quote: Quote;
  direction: PaymentDirection;
  /** Source amount for `send`, target amount for `receive`. */
  amount: Decimal.Value;
  feePolicy: FeePolicy;
  createdBy: string;
  reference?: string;
  now?: Date;
}

export function isTerminalStatus(status: PaymentStatus): boolean {
  return TERMINAL_PAYMENT_STATUSES.has(status);
}

/**
 * Derive a draft payment from a live quote.
 *
 * Amounts stay at full precision through the conversion and fee; each output
 * is rounded once, half-even, to its currency's minor units. The fee is
 * charged in the source currency on top of the principal, so the beneficiary
 * always receives the converted principal.
 */
export function buildPayment(input: BuildPaymentInput): Payment {
  const now = input.now ?? new Date();
  const { quote } = input;

  if (isQuoteExpired(quote, now)) {
    throw new QuoteExpiredError(quote.quoteId, quote.expiresAt);
  }

  if (input.createdBy.trim().length === 0) {
    throw new ValidationError('createdBy is required.');
  }

  const amount = toPositiveDecimal(input.amount);
  const { source, target } = quote.pair;

  const amountCurrency = input.direction === 'send' ? source : target;
  if (amount.decimalPlaces() > minorUnits(amountCurrency)) {
    throw new ValidationError(`amount has more decimal places than ${amountCurrency} allows.`, {
      amount: amount.toString(),
      currency: amountCurrency,
      decimals: minorUnits(amountCurrency)
    });
  }

  const sourceAmount = input.direction === 'send' ? amount : amount.dividedBy(quote.finalRate);
  const targetAmount = input.direction === 'send' ? amount.times(quote.finalRate) : amount;
  const feeAmount = input.feePolicy({ amount: sourceAmount, currency: source });

  if (feeAmount.isNegative()) {
    throw new ValidationError('Fee policy produced a negative fee.', { fee: feeAmount.toString() });
  }

  const roundedSource = roundToMinorUnits(sourceAmount, source);
  const roundedTarget = roundToMinorUnits(targetAmount, target);
  if (roundedSource.lte(0) || roundedTarget.lte(0)) {
    throw new ValidationError('amount converts to zero at the quoted rate.', {
      sourceAmount: roundedSource.toString(),
      targetAmount: roundedTarget.toString()
    });
  }

  return {
    paymentId: input.paymentId,
    quoteId: quote.quoteId,
    sourceCurrency: source,
    targetCurrency: target,
    direction: input.direction,
    sourceAmount: roundedSource,
    targetAmount: roundedTarget,
    fxRate: quote.finalRate,
    feeAmount: roundToMinorUnits(feeAmount, source),
    totalDebit: roundToMinorUnits(sourceAmount.plus(feeAmount), source),
    status: 'draft',
    createdBy: input.createdBy,
    reference: input.reference ?? null,
    externalReference: null,
    failureReason: null,
    version: 0,
    createdAt: now,
    updatedAt: now
  };
}

