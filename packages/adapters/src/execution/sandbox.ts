import type { ExecutionReceipt, ExecutionRequest, PaymentExecutionAdapter } from './types.js';

/**
 * Accepts every request and echoes a reference derived from the idempotency
 * key, so repeated dispatches of one payment resolve to the same reference.
 */
export class SandboxExecutionAdapter implements PaymentExecutionAdapter {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  async execute(_request: ExecutionRequest, idempotencyKey: string): Promise<ExecutionReceipt> {
    return {
      externalReference: `sandbox-${idempotencyKey}`,
      acceptedAt: this.clock()
    };
  }
}
