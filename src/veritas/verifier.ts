/**
 * @fileoverview Verifier - decides a Verdict for a Truth against Evidence
 *
 * Dispatches on `truth.kind`. Every path ends in one of the three verdicts:
 * unbound evidence, values of the wrong type and predicates that throw all
 * become UNCERTAIN rather than escaping to the caller.
 *
 * Numeric equality (Analytic, and Probabilistic `==`) uses
 * `|a - b| <= atol + rtol * |b|` where `b` is the expected value.
 *
 * @packageDocumentation
 */

import { isDeepStrictEqual } from 'util';
import {
  createVerifierConfig,
  type VerifierConfig,
  type VerifierConfigOverrides,
} from '../config/index.js';
import { MissingEvidenceError, getErrorMessage } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import { Evidence } from './evidence.js';
import { evidenceNameOf, falsificationForm, formatValue } from './truth.js';
import {
  Verdict,
  type Direction,
  type FalsificationForm,
  type Predicate,
  type Truth,
  type VerificationResult,
} from './types.js';

interface Outcome {
  verdict: Verdict;
  reasoning: string;
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

export class Verifier {
  readonly config: Readonly<VerifierConfig>;

  constructor(config: VerifierConfigOverrides = {}) {
    this.config = createVerifierConfig(config);
  }

  verify(truth: Truth, evidence: Evidence): VerificationResult {
    const form = falsificationForm(truth);
    const bindings = evidence.snapshot();
    const trace: string[] = [
      `Constructing falsification form for: ${truth.statement}`,
      `Falsification form: ${form.description}`,
      `Evidence bindings: ${formatValue(bindings)}`,
    ];

    const outcome = this.evaluate(truth, evidence, form, trace);
    trace.push(`Verdict: ${outcome.verdict}`);

    logDebug('Claim verified', {
      statement: truth.statement,
      kind: truth.kind,
      verdict: outcome.verdict,
    });

    const result: VerificationResult = {
      verdict: outcome.verdict,
      reasoning: outcome.reasoning,
      evidence: bindings,
      statement: truth.statement,
      kind: truth.kind,
      form,
      trace: Object.freeze(trace),
      ...(evidence.source !== undefined && { source: evidence.source }),
    };
    return Object.freeze(result);
  }

  /**
   * Numeric values compare within tolerance; everything else structurally.
   */
  valuesEqual(actual: unknown, expected: unknown): boolean {
    if (isNumeric(actual) && isNumeric(expected)) {
      if (typeof actual === 'bigint' && typeof expected === 'bigint') {
        return actual === expected;
      }
      return this.numbersEqual(Number(actual), Number(expected));
    }
    return isDeepStrictEqual(actual, expected);
  }

  numbersEqual(actual: number, expected: number): boolean {
    if (actual === expected) return true;
    if (!Number.isFinite(actual) || !Number.isFinite(expected)) return false;
    const { absoluteTolerance, relativeTolerance } = this.config;
    return Math.abs(actual - expected) <= absoluteTolerance + relativeTolerance * Math.abs(expected);
  }

  compare(value: number, direction: Direction, threshold: number): boolean {
    switch (direction) {
      case '>':
        return value > threshold;
      case '>=':
        return value >= threshold;
      case '<':
        return value < threshold;
      case '<=':
        return value <= threshold;
      case '==':
        return this.numbersEqual(value, threshold);
    }
  }

  private evaluate(truth: Truth, evidence: Evidence, form: FalsificationForm, trace: string[]): Outcome {
    const name = evidenceNameOf(truth);
    let observed: unknown;
    try {
      observed = evidence.get(name);
    } catch (error) {
      if (!(error instanceof MissingEvidenceError)) throw error;
      trace.push(`Cannot evaluate: missing ${name}`);
      return { verdict: Verdict.UNCERTAIN, reasoning: `Evidence not bound: ${name}` };
    }
    const shown = `${name}=${formatValue(observed)}`;

    switch (truth.kind) {
      case 'analytic': {
        const equal = this.valuesEqual(observed, truth.rhsExpected);
        trace.push(`Compared ${shown} with expected ${formatValue(truth.rhsExpected)}: ${equal ? 'equal' : 'not equal'}`);
        return equal
          ? { verdict: Verdict.SURVIVED, reasoning: `Falsification condition not met: ${shown} equals expected value` }
          : { verdict: Verdict.KILLED, reasoning: `Falsification condition met: ${form.formula} (${shown})` };
      }

      case 'modal': {
        const holds = applyPredicate(truth.invariantPredicate, observed);
        if (!holds.ok) {
          trace.push(`Invariant predicate failed: ${holds.error}`);
          return { verdict: Verdict.UNCERTAIN, reasoning: `Invariant could not be evaluated for ${shown}: ${holds.error}` };
        }
        trace.push(`Invariant evaluated to ${holds.value} for ${shown}`);
        return holds.value
          ? { verdict: Verdict.SURVIVED, reasoning: `Invariant holds for ${shown}` }
          : { verdict: Verdict.KILLED, reasoning: `Falsification condition met: ${form.formula} (${shown})` };
      }

      case 'empirical': {
        const consistent = applyPredicate(truth.expectedPredicate, observed);
        if (!consistent.ok) {
          trace.push(`Expected predicate failed: ${consistent.error}`);
          return { verdict: Verdict.UNCERTAIN, reasoning: `Observation could not be checked for ${shown}: ${consistent.error}` };
        }
        trace.push(`Expected predicate evaluated to ${consistent.value} for ${shown}`);
        return consistent.value
          ? { verdict: Verdict.SURVIVED, reasoning: `Observation consistent with claim (${shown})` }
          : { verdict: Verdict.KILLED, reasoning: `Observation contradicts claim: ${form.description} (${shown})` };
      }

      case 'probabilistic': {
        if (typeof observed !== 'number' || Number.isNaN(observed)) {
          trace.push(`Cannot compare: ${shown} is not a number`);
          return { verdict: Verdict.UNCERTAIN, reasoning: `Metric is not a number: ${shown}` };
        }
        const relation = `${name} ${truth.direction} ${truth.threshold}`;
        const holds = this.compare(observed, truth.direction, truth.threshold);
        trace.push(`Checked ${relation} with ${shown}: ${holds ? 'holds' : 'violated'}`);
        return holds
          ? { verdict: Verdict.SURVIVED, reasoning: `Threshold holds: ${relation} (${shown})` }
          : { verdict: Verdict.KILLED, reasoning: `Falsification condition met: ${form.formula} (${shown})` };
      }
    }
  }
}

/**
 * Run a caller-supplied predicate. Anything other than a boolean result is an
 * error value, as is a thrown exception.
 */
function applyPredicate(predicate: Predicate, value: unknown): Result<boolean, string> {
  let outcome: unknown;
  try {
    outcome = predicate(value);
  } catch (error) {
    return Err(getErrorMessage(error));
  }
  if (typeof outcome !== 'boolean') {
    return Err(`predicate returned ${formatValue(outcome)}, expected boolean`);
  }
  return Ok(outcome);
}

// ============================================================================
// CONVENIENCE
// ============================================================================

export function verify(truth: Truth, evidence: Evidence, config?: VerifierConfigOverrides): VerificationResult {
  return new Verifier(config).verify(truth, evidence);
}

/** Verify against plain bindings and return only the verdict. */
export function quickCheck(
  truth: Truth,
  bindings: Record<string, unknown>,
  config?: VerifierConfigOverrides,
): Verdict {
  return verify(truth, new Evidence(bindings), config).verdict;
}
