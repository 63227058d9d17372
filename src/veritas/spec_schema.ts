/**
 * @fileoverview Declarative truth specs
 *
 * A truth spec is the serializable form of a Truth: predicates are written as
 * data so that specs can travel between processes, or sit in a YAML file next
 * to the tests that check them.
 *
 * ```yaml
 * claims:
 *   - kind: probabilistic
 *     statement: Model accuracy above 60%
 *     metricName: accuracy
 *     threshold: 0.6
 *     direction: '>'
 *   - kind: modal
 *     statement: balance never negative
 *     stateVarName: balance
 *     invariant: { op: '>=', value: 0 }
 * ```
 *
 * Uses Zod for runtime validation; every failure surfaces as a
 * ConfigurationError.
 *
 * @packageDocumentation
 */

import { isDeepStrictEqual } from 'util';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import { Err, Ok, unwrap, type Result } from '../core/result.js';
import {
  DEFAULT_OBSERVATION_VAR,
  DEFAULT_STATE_VAR,
  analytic,
  empirical,
  formatValue,
  modal,
  probabilistic,
} from './truth.js';
import { DIRECTIONS, type Predicate, type Truth } from './types.js';

// ============================================================================
// PREDICATE SCHEMAS
// ============================================================================

export const ComparisonPredicateSchema = z.object({
  op: z.enum(['>', '>=', '<', '<=']),
  value: z.number(),
}).strict();

export const EqualityPredicateSchema = z.object({
  op: z.enum(['==', '!=']),
  value: z.unknown(),
}).strict();

export const MembershipPredicateSchema = z.object({
  op: z.literal('in'),
  values: z.array(z.unknown()),
}).strict();

export const UnaryPredicateSchema = z.object({
  op: z.enum(['is_null', 'not_null', 'non_empty']),
}).strict();

export const PredicateSpecSchema = z.union([
  ComparisonPredicateSchema,
  EqualityPredicateSchema,
  MembershipPredicateSchema,
  UnaryPredicateSchema,
]);

export type PredicateSpec = z.infer<typeof PredicateSpecSchema>;

// ============================================================================
// TRUTH SCHEMAS
// ============================================================================

const StatementSchema = z.string().trim().min(1);
const NameSchema = z.string().trim().min(1);

export const AnalyticSpecSchema = z.object({
  kind: z.literal('analytic'),
  statement: StatementSchema,
  lhsName: NameSchema,
  rhsExpected: z.unknown(),
}).strict();

export const ModalSpecSchema = z.object({
  kind: z.literal('modal'),
  statement: StatementSchema,
  stateVarName: NameSchema.optional(),
  invariant: PredicateSpecSchema,
}).strict();

export const EmpiricalSpecSchema = z.object({
  kind: z.literal('empirical'),
  statement: StatementSchema,
  observationVarName: NameSchema.optional(),
  expected: PredicateSpecSchema,
  contradictionDescription: z.string().optional(),
}).strict();

export const ProbabilisticSpecSchema = z.object({
  kind: z.literal('probabilistic'),
  statement: StatementSchema,
  metricName: NameSchema.optional(),
  threshold: z.number().finite(),
  direction: z.enum(DIRECTIONS).optional(),
}).strict();

export const TruthSpecSchema = z.discriminatedUnion('kind', [
  AnalyticSpecSchema,
  ModalSpecSchema,
  EmpiricalSpecSchema,
  ProbabilisticSpecSchema,
]);

export type TruthSpec = z.infer<typeof TruthSpecSchema>;

const TruthSpecDocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ claims: z.array(z.unknown()) }),
]);

// ============================================================================
// PREDICATES
// ============================================================================

function requireNumber(value: unknown): number {
  if (typeof value !== 'number') {
    throw new TypeError(`expected a number, got ${formatValue(value)}`);
  }
  return value;
}

function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string' || Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Comparison operators throw on non-numbers so the verifier reports the
 * mismatch as UNCERTAIN instead of KILLED.
 */
export function compilePredicate(spec: PredicateSpec): Predicate {
  switch (spec.op) {
    case '>': {
      const bound = spec.value;
      return (value) => requireNumber(value) > bound;
    }
    case '>=': {
      const bound = spec.value;
      return (value) => requireNumber(value) >= bound;
    }
    case '<': {
      const bound = spec.value;
      return (value) => requireNumber(value) < bound;
    }
    case '<=': {
      const bound = spec.value;
      return (value) => requireNumber(value) <= bound;
    }
    case '==': {
      const expected = spec.value;
      return (value) => isDeepStrictEqual(value, expected);
    }
    case '!=': {
      const excluded = spec.value;
      return (value) => !isDeepStrictEqual(value, excluded);
    }
    case 'in': {
      const members = spec.values;
      return (value) => members.some((candidate) => isDeepStrictEqual(candidate, value));
    }
    case 'is_null':
      return (value) => value === null || value === undefined;
    case 'not_null':
      return (value) => value !== null && value !== undefined;
    case 'non_empty':
      return (value) => !isEmpty(value);
  }
}

export function describePredicate(spec: PredicateSpec, name: string): string {
  switch (spec.op) {
    case '>':
    case '>=':
    case '<':
    case '<=':
    case '==':
    case '!=':
      return `${name} ${spec.op} ${formatValue(spec.value)}`;
    case 'in':
      return `${name} ∈ ${formatValue(spec.values)}`;
    case 'is_null':
      return `${name} is null`;
    case 'not_null':
      return `${name} is not null`;
    case 'non_empty':
      return `${name} is non-empty`;
  }
}

// ============================================================================
// SPEC → TRUTH
// ============================================================================

export function truthFromSpec(spec: TruthSpec): Truth {
  switch (spec.kind) {
    case 'analytic':
      return analytic({ statement: spec.statement, lhsName: spec.lhsName, rhsExpected: spec.rhsExpected });
    case 'modal': {
      const name = spec.stateVarName ?? DEFAULT_STATE_VAR;
      return modal({
        statement: spec.statement,
        stateVarName: name,
        invariantPredicate: compilePredicate(spec.invariant),
        invariantDescription: describePredicate(spec.invariant, name),
      });
    }
    case 'empirical': {
      const name = spec.observationVarName ?? DEFAULT_OBSERVATION_VAR;
      return empirical({
        statement: spec.statement,
        observationVarName: name,
        expectedPredicate: compilePredicate(spec.expected),
        contradictionDescription: spec.contradictionDescription ?? `¬(${describePredicate(spec.expected, name)})`,
      });
    }
    case 'probabilistic':
      return probabilistic({
        statement: spec.statement,
        metricName: spec.metricName,
        threshold: spec.threshold,
        direction: spec.direction,
      });
  }
}

function toConfigurationError(error: z.ZodError, prefix: string): ConfigurationError {
  const issue = error.issues[0];
  const path = issue ? issue.path.join('.') : '';
  const field = path ? `${prefix}.${path}` : prefix;
  return new ConfigurationError(field, issue?.message ?? 'invalid value');
}

export function safeParseTruthSpec(value: unknown, field = 'truth spec'): Result<Truth, ConfigurationError> {
  const parsed = TruthSpecSchema.safeParse(value);
  if (!parsed.success) {
    return Err(toConfigurationError(parsed.error, field));
  }
  try {
    return Ok(truthFromSpec(parsed.data));
  } catch (error) {
    if (error instanceof ConfigurationError) return Err(error);
    throw error;
  }
}

export function parseTruthSpec(value: unknown): Truth {
  return unwrap(safeParseTruthSpec(value));
}

/**
 * Read truths from YAML. The document may be a single spec, a list of specs,
 * or an object with a `claims` list.
 */
export function parseTruthSpecs(yamlText: string): Truth[] {
  let document: unknown;
  try {
    document = YAML.parse(yamlText);
  } catch (error) {
    throw new ConfigurationError('yaml', getErrorMessage(error));
  }

  const container = TruthSpecDocumentSchema.safeParse(document);
  if (!container.success) {
    return [parseTruthSpec(document)];
  }
  const items = Array.isArray(container.data) ? container.data : container.data.claims;
  return items.map((item, index) => unwrap(safeParseTruthSpec(item, `claims[${index}]`)));
}
