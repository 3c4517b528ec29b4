import type { Decimal } from 'decimal.js';

export interface ExecutionRequest {
  paymentId: string;
  sourceCurrency: string;
  targetCurrency: string;
  sourceAmount: Decimal;
  targetAmount: Decimal;
  fxRate: Decimal;
  reference: string | null;
}

export interface ExecutionReceipt {
  externalReference: string;
  acceptedAt: Date;
}

/** Hands an approved payment to the bank-side execution provider. */
export interface PaymentExecutionAdapter {
  execute(request: ExecutionRequest, idempotencyKey: string): Promise<ExecutionReceipt>;
}
