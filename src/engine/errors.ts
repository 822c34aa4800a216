import type { Failure, FailureCode, Outcome } from '../types.js';

// ─── Synchronous failures ───

const STATE_CODES: ReadonlySet<FailureCode> = new Set<FailureCode>([
  'SessionNotActive',
  'InsufficientFunds',
  'CreditLimitExceeded',
  'AlreadyOwned',
  'NotOwned',
  'ItemNotPurchasable',
]);

export function fail<T>(code: FailureCode, message: string): Outcome<T> {
  return {
    success: false,
    error: { code, kind: STATE_CODES.has(code) ? 'state' : 'validation', message },
  };
}

export function ok<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function describeFailure(error: Failure): string {
  return `${error.code}: ${error.message}`;
}

// ─── Store failures ───

// transient: connection drop, busy/locked, deadlock, timeout
// integrity: constraint violation; the transaction was rolled back
// fatal:     retry budget spent or an unclassified driver failure
// aborted:   the gateway was shut down before the request settled
export type StoreErrorKind = 'transient' | 'integrity' | 'fatal' | 'aborted';

export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly requestId: number | null;

  constructor(kind: StoreErrorKind, message: string, options: { requestId?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StoreError';
    this.kind = kind;
    this.requestId = options.requestId ?? null;
  }

  withRequest(requestId: number): StoreError {
    return new StoreError(this.kind, this.message, { requestId, cause: this.cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
