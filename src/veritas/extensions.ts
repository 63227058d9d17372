/**
 * @fileoverview Domain truths
 *
 * A domain truth turns a domain assertion ("GET /health returns 200") into
 * one of the four base truth kinds, and knows how to pull evidence out of the
 * domain's own data.
 *
 * @packageDocumentation
 */

import { Evidence } from './evidence.js';
import { analytic, empirical, modal, probabilistic } from './truth.js';
import type {
  AnalyticTruth,
  EmpiricalTruth,
  ModalTruth,
  Predicate,
  ProbabilisticTruth,
  Truth,
  VerificationResult,
} from './types.js';
import { Verifier } from './verifier.js';

export interface DomainTruth<TInput, TTruth extends Truth = Truth> {
  /** e.g. 'api', 'ml', 'state', 'grounding' */
  readonly domain: string;
  toTruth(): TTruth;
  collect(input: TInput): Evidence;
}

export function verifyDomain<TInput>(
  domainTruth: DomainTruth<TInput>,
  input: TInput,
  verifier: Verifier = new Verifier(),
): VerificationResult {
  return verifier.verify(domainTruth.toTruth(), domainTruth.collect(input));
}

// ============================================================================
// HTTP
// ============================================================================

export interface HttpResponseInput {
  statusCode: number;
  metadata?: Record<string, unknown>;
}

export function httpResponse(endpoint: string, expectedStatus: number): DomainTruth<HttpResponseInput, AnalyticTruth> {
  return {
    domain: 'api',
    toTruth: () =>
      analytic({
        statement: `GET ${endpoint} returns ${expectedStatus}`,
        lhsName: 'status_code',
        rhsExpected: expectedStatus,
      }),
    collect: ({ statusCode, metadata }) =>
      new Evidence({ status_code: statusCode }, { source: `HTTP ${endpoint}`, metadata }),
  };
}

// ============================================================================
// MODEL ACCURACY
// ============================================================================

export interface ModelAccuracyInput {
  accuracy: number;
  metadata?: Record<string, unknown>;
}

export function modelAccuracy(modelName: string, threshold: number): DomainTruth<ModelAccuracyInput, ProbabilisticTruth> {
  return {
    domain: 'ml',
    toTruth: () =>
      probabilistic({
        statement: `${modelName} accuracy >= ${threshold}`,
        metricName: 'accuracy',
        threshold,
        direction: '>=',
      }),
    collect: ({ accuracy, metadata }) =>
      new Evidence({ accuracy }, { source: `model evaluation: ${modelName}`, metadata }),
  };
}

// ============================================================================
// STATE INVARIANTS
// ============================================================================

export function invariantCheck<TState>(
  propertyName: string,
  predicate: Predicate<TState>,
  isState: (value: unknown) => value is TState,
): DomainTruth<TState, ModalTruth> {
  return {
    domain: 'state',
    toTruth: () =>
      modal({
        statement: `${propertyName} holds`,
        invariantPredicate: (value) => {
          if (!isState(value)) {
            throw new TypeError(`state does not have the shape ${propertyName} expects`);
          }
          return predicate(value);
        },
        invariantDescription: propertyName,
      }),
    collect: (state) => new Evidence({ state }, { source: `invariant check: ${propertyName}` }),
  };
}

// ============================================================================
// GROUNDING
// ============================================================================

export function dataGrounding(claimText: string, evidenceType: string): DomainTruth<unknown, EmpiricalTruth> {
  return {
    domain: 'grounding',
    toTruth: () =>
      empirical({
        statement: `${claimText} has ${evidenceType} support`,
        observationVarName: 'support',
        expectedPredicate: (support) => support !== null && support !== undefined && support !== '',
        contradictionDescription: `No ${evidenceType} found for: ${claimText}`,
      }),
    collect: (support) => new Evidence({ support }, { source: `grounding check: ${evidenceType}` }),
  };
}
