import { ExecutionAdapterError, type ExecutionRequest, type PaymentExecutionAdapter } from '@fxdesk/adapters';
import { planTransition, systemActor, type Payment } from '@fxdesk/domain';
import type { ServiceLogger } from '@fxdesk/observability';
import type { PaymentService } from './service.js';
import type { ExecutionOutcome } from './types.js';

const EXECUTION_ACTOR = systemActor('execution');

function toExecutionRequest(payment: Payment): ExecutionRequest {
  return {
    paymentId: payment.paymentId,
    sourceCurrency: payment.sourceCurrency,
    targetCurrency: payment.targetCurrency,
    sourceAmount: payment.sourceAmount,
    targetAmount: payment.targetAmount,
    fxRate: payment.fxRate,
    reference: payment.reference
  };
}

/**
 * Bridges approved payments to the execution provider and records the
 * provider's progress. Nothing here is retried automatically.
 */
export class ExecutionService {
  constructor(
    private readonly payments: PaymentService,
    private readonly adapter: PaymentExecutionAdapter,
    private readonly logger?: ServiceLogger
  ) {}

  async dispatch(paymentId: string): Promise<Payment> {
    const payment = await this.payments.getPayment(paymentId);
    // Refuse before the provider sees anything.
    planTransition(payment, 'dispatch', EXECUTION_ACTOR);

    let externalReference: string;
    try {
      const receipt = await this.adapter.execute(toExecutionRequest(payment), `payment:${paymentId}`);
      externalReference = receipt.externalReference;
    } catch (error) {
      this.logger?.error('Payment dispatch failed', {
        paymentId,
        error: error instanceof Error ? error.message : String(error)
      });
      if (error instanceof ExecutionAdapterError) {
        throw error;
      }
      throw new ExecutionAdapterError('Execution provider failure.', { cause: error });
    }

    return this.payments.applyAction(paymentId, 'dispatch', EXECUTION_ACTOR, { externalReference });
  }

  async recordOutcome(paymentId: string, outcome: ExecutionOutcome, failureReason?: string): Promise<Payment> {
    const payment = await this.payments.getPayment(paymentId);

    if (outcome === 'submitted') {
      if (payment.status === 'submitted') {
        return payment;
      }
      return this.payments.applyAction(paymentId, 'dispatch', EXECUTION_ACTOR);
    }

    if (payment.status === 'submitted') {
      await this.payments.applyAction(paymentId, 'start_processing', EXECUTION_ACTOR);
    }

    if (outcome === 'completed') {
      return this.payments.applyAction(paymentId, 'complete', EXECUTION_ACTOR);
    }

    return this.payments.applyAction(paymentId, 'fail', EXECUTION_ACTOR, {
      failureReason: failureReason?.trim() ? failureReason.trim() : 'unspecified'
    });
  }
}
