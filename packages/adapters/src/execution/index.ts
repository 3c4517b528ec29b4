export { ExecutionAdapterError } from './errors.js';
export { SandboxExecutionAdapter } from './sandbox.js';
export type { ExecutionReceipt, ExecutionRequest, PaymentExecutionAdapter } from './types.js';
