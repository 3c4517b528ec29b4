export { PaymentNotFoundError } from './errors.js';
export { ExecutionService } from './execution.js';
export { PaymentRepository } from './repository.js';
export { PaymentService, type PaymentServiceDeps, type PaymentServiceOptions, type QuoteLookup } from './service.js';
export {
  EXECUTION_OUTCOMES,
  type CreateDraftInput,
  type CreatePaymentRecords,
  type ExecutionOutcome,
  type PaymentListFilter,
  type PaymentRepositoryPort,
  type TransitionFn,
  type TransitionOptions,
  type TransitionRecords
} from './types.js';
export { toApprovalEventView, toPaymentView, type ApprovalEventView, type PaymentView } from './view.js';
