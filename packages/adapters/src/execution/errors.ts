export class ExecutionAdapterError extends Error {
  readonly code = 'EXECUTION_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExecutionAdapterError';
  }
}
