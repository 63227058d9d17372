/**
 * @fileoverview Truth construction and validation
 *
 * Factories validate their parameters and return frozen truths. Nothing here
 * reads evidence; bad parameters throw ConfigurationError immediately.
 *
 * @packageDocumentation
 */

import { inspect } from 'util';
import { ConfigurationError } from '../core/errors.js';
import {
  DIRECTIONS,
  TRUTH_KINDS,
  type AnalyticTruth,
  type Direction,
  type EmpiricalTruth,
  type FalsificationForm,
  type ModalTruth,
  type Predicate,
  type ProbabilisticTruth,
  type Truth,
} from './types.js';

// ============================================================================
// PARAMETERS
// ============================================================================

export interface AnalyticParams {
  statement: string;
  lhsName: string;
  rhsExpected: unknown;
}

export interface ModalParams {
  statement: string;
  invariantPredicate: Predicate;
  stateVarName?: string;
  invariantDescription?: string;
}

export interface EmpiricalParams {
  statement: string;
  expectedPredicate: Predicate;
  observationVarName?: string;
  contradictionDescription?: string;
}

export interface ProbabilisticParams {
  statement: string;
  threshold: number;
  metricName?: string;
  direction?: Direction;
}

export type TruthParams =
  | ({ kind: 'analytic' } & AnalyticParams)
  | ({ kind: 'modal' } & ModalParams)
  | ({ kind: 'empirical' } & EmpiricalParams)
  | ({ kind: 'probabilistic' } & ProbabilisticParams);

export const DEFAULT_STATE_VAR = 'state';
export const DEFAULT_OBSERVATION_VAR = 'observation';
export const DEFAULT_METRIC = 'value';

// ============================================================================
// VALIDATION
// ============================================================================

function requireName(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigurationError(field, 'must be a non-empty string');
  }
  return value;
}

function requirePredicate(field: string, value: Predicate): Predicate {
  if (typeof value !== 'function') {
    throw new ConfigurationError(field, `must be a function, got ${typeof value}`);
  }
  return value;
}

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && DIRECTIONS.some((direction) => direction === value);
}

// ============================================================================
// FACTORIES
// ============================================================================

export function analytic(params: AnalyticParams): AnalyticTruth {
  const truth: AnalyticTruth = {
    kind: 'analytic',
    statement: requireName('statement', params.statement),
    lhsName: requireName('lhsName', params.lhsName),
    rhsExpected: params.rhsExpected,
  };
  return Object.freeze(truth);
}

export function modal(params: ModalParams): ModalTruth {
  const truth: ModalTruth = {
    kind: 'modal',
    statement: requireName('statement', params.statement),
    stateVarName: requireName('stateVarName', params.stateVarName ?? DEFAULT_STATE_VAR),
    invariantPredicate: requirePredicate('invariantPredicate', params.invariantPredicate),
    invariantDescription: params.invariantDescription,
  };
  return Object.freeze(truth);
}

export function empirical(params: EmpiricalParams): EmpiricalTruth {
  const truth: EmpiricalTruth = {
    kind: 'empirical',
    statement: requireName('statement', params.statement),
    observationVarName: requireName('observationVarName', params.observationVarName ?? DEFAULT_OBSERVATION_VAR),
    expectedPredicate: requirePredicate('expectedPredicate', params.expectedPredicate),
    contradictionDescription: params.contradictionDescription,
  };
  return Object.freeze(truth);
}

export function probabilistic(params: ProbabilisticParams): ProbabilisticTruth {
  const direction: unknown = params.direction ?? '>';
  if (!isDirection(direction)) {
    throw new ConfigurationError('direction', `expected one of ${DIRECTIONS.join(', ')}, got ${inspect(direction)}`);
  }
  const threshold: unknown = params.threshold;
  if (typeof threshold !== 'number' || !Number.isFinite(threshold)) {
    throw new ConfigurationError('threshold', `must be a finite number, got ${inspect(threshold)}`);
  }
  const truth: ProbabilisticTruth = {
    kind: 'probabilistic',
    statement: requireName('statement', params.statement),
    metricName: requireName('metricName', params.metricName ?? DEFAULT_METRIC),
    threshold,
    direction,
  };
  return Object.freeze(truth);
}

/**
 * Build any kind of truth from tagged parameters. Unknown kinds are a
 * ConfigurationError, which matters for parameters that came from outside the
 * type system.
 */
export function createTruth(params: TruthParams): Truth {
  switch (params.kind) {
    case 'analytic':
      return analytic(params);
    case 'modal':
      return modal(params);
    case 'empirical':
      return empirical(params);
    case 'probabilistic':
      return probabilistic(params);
    default:
      throw new ConfigurationError(
        'kind',
        `expected one of ${TRUTH_KINDS.join(', ')}, got ${inspect(Reflect.get(params, 'kind'))}`,
      );
  }
}

// ============================================================================
// FALSIFICATION FORMS
// ============================================================================

export function formatValue(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Infinity });
}

/** The variable a truth reads from evidence. */
export function evidenceNameOf(truth: Truth): string {
  switch (truth.kind) {
    case 'analytic':
      return truth.lhsName;
    case 'modal':
      return truth.stateVarName;
    case 'empirical':
      return truth.observationVarName;
    case 'probabilistic':
      return truth.metricName;
  }
}

export function falsificationForm(truth: Truth): FalsificationForm {
  const name = evidenceNameOf(truth);
  switch (truth.kind) {
    case 'analytic': {
      const formula = `${name} ≠ ${formatValue(truth.rhsExpected)}`;
      return Object.freeze({
        formula,
        freeVariables: Object.freeze([name]),
        description: `Find ${name} where ${formula}`,
      });
    }
    case 'modal': {
      const invariant = truth.invariantDescription ?? `P(${name})`;
      return Object.freeze({
        formula: `¬(${invariant})`,
        freeVariables: Object.freeze([name]),
        description: `Find ${name} where ¬(${invariant})`,
      });
    }
    case 'empirical':
      return Object.freeze({
        formula: `Contradicts(${name})`,
        freeVariables: Object.freeze([name]),
        description: truth.contradictionDescription || `Find ${name} that contradicts claim`,
      });
    case 'probabilistic': {
      const relation = `${name} ${truth.direction} ${truth.threshold}`;
      return Object.freeze({
        formula: `¬(${relation})`,
        freeVariables: Object.freeze([name]),
        description: `Find ${name} where ¬(${relation})`,
      });
    }
  }
}

const KIND_LABELS: Record<Truth['kind'], string> = {
  analytic: 'Analytic',
  modal: 'Modal',
  empirical: 'Empirical',
  probabilistic: 'Probabilistic',
};

export function describeTruth(truth: Truth): string {
  return `${KIND_LABELS[truth.kind]}(${JSON.stringify(truth.statement)})`;
}
