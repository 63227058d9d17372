/**
 * @fileoverview Scoped claim contexts
 *
 * A ClaimContext collects evidence for one truth and verifies exactly once
 * when it closes. `claim()` and `claimAsync()` bound the scope to a callback:
 *
 * ```typescript
 * const ctx = claim(analytic({ statement: '2+2=4', lhsName: 'result', rhsExpected: 4 }), (c) => {
 *   c.bind({ result: 2 + 2 });
 * });
 * ctx.result?.verdict; // 'SURVIVED'
 * ```
 *
 * If the callback throws, the scope closes without a verdict and the error
 * propagates: a broken harness is not a claim outcome.
 *
 * @packageDocumentation
 */

import type { VerifierConfigOverrides } from '../config/index.js';
import {
  ClaimKilledError,
  ClaimUncertainError,
  ConfigurationError,
  ScopeClosedError,
  getErrorMessage,
  type ScopeOperation,
} from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { Evidence, type EvidenceOptions } from './evidence.js';
import { Verdict, type Truth, type VerificationResult } from './types.js';
import { Verifier } from './verifier.js';

export interface ClaimOptions extends EvidenceOptions {
  /** Verifier to run on close; built from `config` when omitted */
  verifier?: Verifier;
  config?: VerifierConfigOverrides;
}

function resolveVerifier(options: ClaimOptions): Verifier {
  return options.verifier ?? new Verifier(options.config);
}

// ============================================================================
// CLAIM CONTEXT
// ============================================================================

export class ClaimContext {
  readonly evidence: Evidence;
  private readonly verifier: Verifier;
  private closed = false;
  private verification?: VerificationResult;

  constructor(
    readonly truth: Truth,
    options: ClaimOptions = {},
  ) {
    this.evidence = new Evidence({}, { source: options.source, metadata: options.metadata });
    this.verifier = resolveVerifier(options);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Set once the scope closes normally; undefined after an aborted scope. */
  get result(): VerificationResult | undefined {
    return this.verification;
  }

  bind(bindings: Record<string, unknown>): this {
    this.assertOpen('bind');
    this.evidence.bind(bindings);
    return this;
  }

  observe<T>(name: string, value: T): T {
    this.assertOpen('observe');
    return this.evidence.observe(name, value);
  }

  close(): VerificationResult {
    this.assertOpen('close');
    this.closed = true;
    const result = this.verifier.verify(this.truth, this.evidence);
    this.verification = result;
    return result;
  }

  /** Close without verifying. Used when the scope body failed. */
  abort(error: unknown): void {
    this.assertOpen('close');
    this.closed = true;
    logDebug('Claim scope aborted', {
      statement: this.truth.statement,
      error: getErrorMessage(error),
    });
  }

  private assertOpen(operation: ScopeOperation): void {
    if (this.closed) {
      throw new ScopeClosedError(operation, this.truth.statement);
    }
  }
}

export function openClaim(truth: Truth, options?: ClaimOptions): ClaimContext {
  return new ClaimContext(truth, options);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Run a synchronous scope. A body that returns a promise aborts the scope
 * with a ConfigurationError; use `claimAsync` for those. A body may close
 * the context itself, and the result it produced is kept.
 */
export function claim(
  truth: Truth,
  body: (ctx: ClaimContext) => void,
  options?: ClaimOptions,
): ClaimContext {
  const ctx = openClaim(truth, options);
  let returned: unknown;
  try {
    returned = body(ctx);
  } catch (error) {
    if (!ctx.isClosed) ctx.abort(error);
    throw error;
  }
  if (isPromiseLike(returned)) {
    const misuse = new ConfigurationError('body', 'claim() body returned a promise; use claimAsync() for async scopes');
    if (!ctx.isClosed) ctx.abort(misuse);
    void returned.then(undefined, (error: unknown) => {
      logWarning('Async body passed to claim() rejected', {
        statement: truth.statement,
        error: getErrorMessage(error),
      });
    });
    throw misuse;
  }
  if (!ctx.isClosed) ctx.close();
  return ctx;
}

export async function claimAsync(
  truth: Truth,
  body: (ctx: ClaimContext) => Promise<void>,
  options?: ClaimOptions,
): Promise<ClaimContext> {
  const ctx = openClaim(truth, options);
  try {
    await body(ctx);
  } catch (error) {
    if (!ctx.isClosed) ctx.abort(error);
    throw error;
  }
  if (!ctx.isClosed) ctx.close();
  return ctx;
}

// ============================================================================
// VERIFIED WRAPPERS
// ============================================================================

function toBindings(value: unknown): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (typeof value === 'object' && !Array.isArray(value) && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(Object.entries(value));
  }
  return { result: value };
}

/**
 * Wrap a function whose return value is the evidence for a truth. A plain
 * object is used as bindings; any other value is bound as `result`.
 *
 * The wrapper throws ClaimKilledError on KILLED, and ClaimUncertainError on
 * UNCERTAIN when the verifier is strict.
 */
export function verified<TArgs extends unknown[]>(
  truthFactory: () => Truth,
  fn: (...args: TArgs) => unknown,
  options: ClaimOptions = {},
): (...args: TArgs) => VerificationResult {
  const verifier = resolveVerifier(options);
  return (...args: TArgs): VerificationResult => {
    const truth = truthFactory();
    const evidence = new Evidence(toBindings(fn(...args)), {
      source: options.source ?? (fn.name ? `function: ${fn.name}` : undefined),
      metadata: options.metadata,
    });
    const result = verifier.verify(truth, evidence);
    if (result.verdict === Verdict.KILLED) {
      throw new ClaimKilledError(truth.statement, result.reasoning);
    }
    if (result.verdict === Verdict.UNCERTAIN && verifier.config.strict) {
      throw new ClaimUncertainError(truth.statement, result.reasoning);
    }
    return result;
  };
}
