/** SQLSTATE the store raises when two transactions cannot both be serialized. */
export const SERIALIZATION_FAILURE_CODE = '40001';

export type StoreErrorKind = 'conflict' | 'other';

/**
 * Driver failure tagged at the data-store boundary so callers never inspect
 * driver-specific error classes.
 */
export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly retryable: boolean;
  readonly code: string | undefined;

  constructor(params: { kind: StoreErrorKind; message: string; code?: string; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.name = 'StoreError';
    this.kind = params.kind;
    this.retryable = params.kind === 'conflict';
    this.code = params.code;
  }
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function classifyStoreError(code: string | undefined): StoreErrorKind {
  return code === SERIALIZATION_FAILURE_CODE ? 'conflict' : 'other';
}

export function toStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) {
    return error;
  }

  const code = readErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  return new StoreError({
    kind: classifyStoreError(code),
    message,
    ...(code !== undefined ? { code } : {}),
    cause: error
  });
}

export function isConflictError(error: unknown): error is StoreError {
  return error instanceof StoreError && error.retryable;
}
