/**
 * Typed errors raised by the coordinator. Routine outcomes (task not found,
 * task held by another agent) are reported as false/null, not thrown.
 */

export class LockTimeoutError extends Error {
  readonly code = 'ELOCKTIMEOUT';

  constructor(
    readonly lockPath: string,
    readonly timeoutMs: number
  ) {
    super(`Could not acquire lock on ${lockPath} within ${timeoutMs}ms`);
    this.name = 'LockTimeoutError';
  }
}

export class StateCorruptedError extends Error {
  readonly code = 'ESTATECORRUPT';

  constructor(readonly statePath: string, reason: string) {
    super(`State file ${statePath} is corrupted: ${reason}`);
    this.name = 'StateCorruptedError';
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends Error {
  readonly code = 'EVALIDATION';

  constructor(message: string, readonly details: ValidationErrorDetail[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}
