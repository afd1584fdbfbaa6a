export type StoreOperation = 'open' | 'read' | 'write' | 'delete';

export class StoreError extends Error {
  readonly operation: StoreOperation;

  constructor(operation: StoreOperation, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.operation = operation;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
