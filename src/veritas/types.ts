/**
 * @fileoverview Veritas core types
 *
 * A Truth is a discriminated union on `kind`. Each kind carries only its own
 * parameters and knows which evidence name it reads:
 *
 * | kind          | reads                | falsification form         |
 * |---------------|----------------------|----------------------------|
 * | analytic      | `lhsName`            | lhs ≠ rhs                  |
 * | modal         | `stateVarName`       | ¬P(state)                  |
 * | empirical     | `observationVarName` | contradicts(observation)   |
 * | probabilistic | `metricName`         | ¬(metric op threshold)     |
 *
 * @packageDocumentation
 */

// ============================================================================
// VERDICT
// ============================================================================

export const Verdict = {
  /** Falsification condition met: the claim is false */
  KILLED: 'KILLED',
  /** Condition not met with valid evidence: the claim held up */
  SURVIVED: 'SURVIVED',
  /** Could not decide: evidence missing or unusable */
  UNCERTAIN: 'UNCERTAIN',
} as const;

export type Verdict = (typeof Verdict)[keyof typeof Verdict];

export const VERDICTS: readonly Verdict[] = [Verdict.KILLED, Verdict.SURVIVED, Verdict.UNCERTAIN];

export function isVerdict(value: unknown): value is Verdict {
  return typeof value === 'string' && VERDICTS.some((verdict) => verdict === value);
}

// ============================================================================
// TRUTH
// ============================================================================

export const TRUTH_KINDS = ['analytic', 'modal', 'empirical', 'probabilistic'] as const;
export type TruthKind = (typeof TRUTH_KINDS)[number];

export const DIRECTIONS = ['>', '>=', '<', '<=', '=='] as const;
export type Direction = (typeof DIRECTIONS)[number];

export type Predicate<T = unknown> = (value: T) => boolean;

interface TruthBase {
  readonly statement: string;
}

export interface AnalyticTruth extends TruthBase {
  readonly kind: 'analytic';
  readonly lhsName: string;
  readonly rhsExpected: unknown;
}

export interface ModalTruth extends TruthBase {
  readonly kind: 'modal';
  readonly stateVarName: string;
  readonly invariantPredicate: Predicate;
  /** Text form of P used in the falsification form */
  readonly invariantDescription?: string;
}

export interface EmpiricalTruth extends TruthBase {
  readonly kind: 'empirical';
  readonly observationVarName: string;
  readonly expectedPredicate: Predicate;
  readonly contradictionDescription?: string;
}

export interface ProbabilisticTruth extends TruthBase {
  readonly kind: 'probabilistic';
  readonly metricName: string;
  readonly threshold: number;
  readonly direction: Direction;
}

export type Truth = AnalyticTruth | ModalTruth | EmpiricalTruth | ProbabilisticTruth;

// ============================================================================
// FALSIFICATION FORM
// ============================================================================

/** The condition that, if observed, kills a truth. */
export interface FalsificationForm {
  readonly formula: string;
  readonly freeVariables: readonly string[];
  readonly description: string;
}

// ============================================================================
// RESULT
// ============================================================================

export type EvidenceBindings = Readonly<Record<string, unknown>>;

export interface VerificationResult {
  readonly verdict: Verdict;
  readonly reasoning: string;
  readonly evidence: EvidenceBindings;
  readonly statement: string;
  readonly kind: TruthKind;
  readonly form: FalsificationForm;
  readonly trace: readonly string[];
  readonly source?: string;
}
