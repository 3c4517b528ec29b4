import { z } from 'zod';
import { EXECUTION_OUTCOMES, toPaymentView, type ExecutionService, type PaymentView } from '../modules/payments/index.js';

const outcomePayloadSchema = z.object({
  outcome: z.enum(EXECUTION_OUTCOMES),
  failureReason: z.string().trim().min(1).max(500).optional()
});

interface HttpResult<T> {
  status: number;
  body: T;
}

/** Called by the execution worker and the provider callback relay, never by end users. */
export function buildInternalExecutionRoutes(service: ExecutionService) {
  return {
    dispatch: async (paymentId: string): Promise<HttpResult<PaymentView>> => ({
      status: 200,
      body: toPaymentView(await service.dispatch(paymentId))
    }),

    recordOutcome: async (paymentId: string, payload: unknown): Promise<HttpResult<PaymentView>> => {
      const input = outcomePayloadSchema.parse(payload);
      return { status: 200, body: toPaymentView(await service.recordOutcome(paymentId, input.outcome, input.failureReason)) };
    }
  };
}
