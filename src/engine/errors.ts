/**
 * Core Error Kinds
 *
 * Business rejections and collaborator failures travel as values in a Result.
 * Only invariant violations are thrown, so an enclosing transaction rolls back.
 */

export interface CollaboratorUnavailable {
  kind: 'CollaboratorUnavailable';
  source: string;
  detail: string;
}

export interface InsufficientFunds {
  kind: 'InsufficientFunds';
  required: number;
  available: number;
}

export interface DailyCapExceeded {
  kind: 'DailyCapExceeded';
  committed: number;
  requested: number;
  cap: number;
}

export interface ValidationError {
  kind: 'ValidationError';
  source: string;
  issues: string[];
}

export interface InvariantViolation {
  kind: 'InvariantViolation';
  detail: string;
}

export interface AlreadyResolved {
  kind: 'AlreadyResolved';
  tradeId: number;
}

export type CoreError =
  | CollaboratorUnavailable
  | InsufficientFunds
  | DailyCapExceeded
  | ValidationError
  | InvariantViolation
  | AlreadyResolved;

// Failures a collaborator call can produce
export type CollaboratorError = CollaboratorUnavailable | ValidationError;

export class InvariantViolationError extends Error {
  readonly violation: InvariantViolation;

  constructor(detail: string) {
    super(detail);
    this.name = 'InvariantViolationError';
    this.violation = { kind: 'InvariantViolation', detail };
  }
}

export function collaboratorUnavailable(source: string, detail: string): CollaboratorUnavailable {
  return { kind: 'CollaboratorUnavailable', source, detail };
}

export function insufficientFunds(required: number, available: number): InsufficientFunds {
  return { kind: 'InsufficientFunds', required, available };
}

export function dailyCapExceeded(committed: number, requested: number, cap: number): DailyCapExceeded {
  return { kind: 'DailyCapExceeded', committed, requested, cap };
}

export function alreadyResolved(tradeId: number): AlreadyResolved {
  return { kind: 'AlreadyResolved', tradeId };
}

export function validationError(source: string, issues: string[]): ValidationError {
  return { kind: 'ValidationError', source, issues };
}

export function invariantViolation(detail: string): InvariantViolation {
  return { kind: 'InvariantViolation', detail };
}

/**
 * One-line description for the activity log
 */
export function describeError(error: CoreError): string {
  switch (error.kind) {
    case 'CollaboratorUnavailable':
      return `${error.source} unavailable: ${error.detail}`;
    case 'InsufficientFunds':
      return `insufficient funds: need $${error.required.toFixed(2)}, have $${error.available.toFixed(2)}`;
    case 'DailyCapExceeded':
      return `daily cap exceeded: committed $${error.committed.toFixed(2)} + $${error.requested.toFixed(2)} > cap $${error.cap.toFixed(2)}`;
    case 'ValidationError':
      return `invalid ${error.source}: ${error.issues.join('; ')}`;
    case 'InvariantViolation':
      return `invariant violated: ${error.detail}`;
    case 'AlreadyResolved':
      return `trade #${error.tradeId} is already resolved`;
  }
}
