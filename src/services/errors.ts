// mcp-task-delegator/src/services/errors.ts
// Error taxonomy and the tagged result returned by every externally callable operation

export type DelegationErrorCode = 'validation' | 'not-found' | 'invalid-state';

export class DelegationError extends Error {
  constructor(readonly code: DelegationErrorCode, message: string) {
    super(message);
    this.name = 'DelegationError';
  }
}

/** Bad caller input: empty description, non-positive budget, malformed fields */
export class ValidationError extends DelegationError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends DelegationError {
  constructor(message: string) {
    super('not-found', message);
    this.name = 'NotFoundError';
  }
}

/** Operation not allowed in the current lifecycle state; nothing was changed */
export class InvalidStateError extends DelegationError {
  constructor(message: string) {
    super('invalid-state', message);
    this.name = 'InvalidStateError';
  }
}

export interface ErrorInfo {
  code: DelegationErrorCode;
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ErrorInfo };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: DelegationError): Result<T> {
  return { ok: false, error: { code: error.code, message: error.message } };
}
