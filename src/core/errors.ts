/**
 * @fileoverview Veritas error hierarchy
 *
 * Only misconfiguration and harness misuse are thrown. Claim outcomes
 * (including "could not decide") are returned as verdicts, never as errors.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class VeritasError extends Error {
  abstract readonly code: string;

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends VeritasError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// EVALUATION ERRORS
// ============================================================================

/**
 * Raised by `Evidence.get` for an unbound name. The verifier turns it into
 * an UNCERTAIN verdict.
 */
export class MissingEvidenceError extends VeritasError {
  readonly code = 'MISSING_EVIDENCE';

  constructor(readonly evidenceName: string) {
    super(`Evidence not bound: ${evidenceName}`);
    this.name = 'MissingEvidenceError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { evidenceName: this.evidenceName },
    };
  }
}

// ============================================================================
// SCOPE ERRORS
// ============================================================================

export type ScopeOperation = 'bind' | 'observe' | 'close';

export class ScopeClosedError extends VeritasError {
  readonly code = 'SCOPE_CLOSED';

  constructor(
    readonly operation: ScopeOperation,
    readonly statement: string,
  ) {
    super(`Cannot ${operation} on closed claim scope: ${statement}`);
    this.name = 'ScopeClosedError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        statement: this.statement,
      },
    };
  }
}

// ============================================================================
// ASSERTION ERRORS (verified wrappers)
// ============================================================================

export class ClaimKilledError extends VeritasError {
  readonly code = 'CLAIM_KILLED';

  constructor(
    readonly statement: string,
    readonly reasoning: string,
  ) {
    super(`Claim KILLED: ${statement}\nReasoning: ${reasoning}`);
    this.name = 'ClaimKilledError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { statement: this.statement, reasoning: this.reasoning },
    };
  }
}

export class ClaimUncertainError extends VeritasError {
  readonly code = 'CLAIM_UNCERTAIN';

  constructor(
    readonly statement: string,
    readonly reasoning: string,
  ) {
    super(`Claim UNCERTAIN: ${statement}\nReasoning: ${reasoning}`);
    this.name = 'ClaimUncertainError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { statement: this.statement, reasoning: this.reasoning },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

export function isVeritasError(error: unknown): error is VeritasError {
  return error instanceof VeritasError;
}
