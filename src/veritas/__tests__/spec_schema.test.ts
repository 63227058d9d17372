/**
 * @fileoverview Tests for declarative truth specs
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../core/errors.js';
import {
  compilePredicate,
  describePredicate,
  parseTruthSpec,
  parseTruthSpecs,
  safeParseTruthSpec,
} from '../spec_schema.js';
import { Verdict } from '../types.js';
import { quickCheck, verify } from '../verifier.js';
import { Evidence } from '../evidence.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

const CLAIMS_YAML = `
claims:
  - kind: probabilistic
    statement: Model accuracy above 60%
    metricName: accuracy
    threshold: 0.6
    direction: '>'
  - kind: modal
    statement: balance never negative
    stateVarName: balance
    invariant: { op: '>=', value: 0 }
`;

describe('parseTruthSpecs', () => {
  it('reads a claims document', () => {
    const [accuracy, balance] = parseTruthSpecs(CLAIMS_YAML);

    expect(accuracy?.kind).toBe('probabilistic');
    expect(balance?.kind).toBe('modal');
  });

  it('produces truths the verifier can check', () => {
    const truths = parseTruthSpecs(CLAIMS_YAML);
    const [accuracy, balance] = truths;
    if (!accuracy || !balance) throw new Error('expected two truths');

    expect(truths).toHaveLength(2);
    expect(quickCheck(accuracy, { accuracy: 0.7 })).toBe(Verdict.SURVIVED);
    expect(quickCheck(balance, { balance: 3 })).toBe(Verdict.SURVIVED);

    const result = verify(balance, new Evidence({ balance: -1 }));
    expect(result.verdict).toBe(Verdict.KILLED);
    expect(result.reasoning).toBe('Falsification condition met: ¬(balance >= 0) (balance=-1)');
  });

  it('reads a plain list and a single spec', () => {
    const list = parseTruthSpecs(`
- kind: analytic
  statement: 2+2=4
  lhsName: result
  rhsExpected: 4
`);
    const single = parseTruthSpecs('kind: probabilistic\nstatement: above half\nthreshold: 0.5\n');

    expect(list).toHaveLength(1);
    expect(list[0]).toMatchObject({ kind: 'analytic', statement: '2+2=4', lhsName: 'result', rhsExpected: 4 });
    expect(single).toHaveLength(1);
    expect(single[0]).toMatchObject({ kind: 'probabilistic', metricName: 'value', direction: '>' });
  });

  it('names the failing claim in errors', () => {
    const error = thrownBy(() =>
      parseTruthSpecs(`
claims:
  - kind: probabilistic
    statement: p equals half
    threshold: 0.5
    direction: '='
`),
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: 'claims[0].direction' });
  });

  it('rejects unknown kinds', () => {
    const error = thrownBy(() => parseTruthSpecs('kind: deontic\nstatement: s\n'));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: 'truth spec.kind' });
  });

  it('reports malformed YAML as a configuration error', () => {
    const error = thrownBy(() => parseTruthSpecs('claims: [unclosed'));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: 'yaml' });
  });
});

describe('parseTruthSpec', () => {
  it('derives a contradiction description from the expected predicate', () => {
    const truth = parseTruthSpec({
      kind: 'empirical',
      statement: 'no blocker',
      observationVarName: 'blocker',
      expected: { op: 'is_null' },
    });

    const result = verify(truth, new Evidence({ blocker: 'disk full' }));

    expect(result.verdict).toBe(Verdict.KILLED);
    expect(result.reasoning).toBe("Observation contradicts claim: ¬(blocker is null) (blocker='disk full')");
  });

  it('keeps an explicit contradiction description', () => {
    const truth = parseTruthSpec({
      kind: 'empirical',
      statement: 'no blocker',
      expected: { op: 'is_null' },
      contradictionDescription: 'a blocker was observed',
    });

    expect(verify(truth, new Evidence({ observation: 1 })).form.description).toBe('a blocker was observed');
  });

  it('is uncertain when a comparison meets a non-number', () => {
    const truth = parseTruthSpec({
      kind: 'modal',
      statement: 'balance never negative',
      stateVarName: 'balance',
      invariant: { op: '>=', value: 0 },
    });

    const result = verify(truth, new Evidence({ balance: 'x' }));

    expect(result.verdict).toBe(Verdict.UNCERTAIN);
    expect(result.reasoning).toBe("Invariant could not be evaluated for balance='x': expected a number, got 'x'");
  });

  it('checks membership', () => {
    const truth = parseTruthSpec({
      kind: 'empirical',
      statement: 'status is known',
      observationVarName: 'status',
      expected: { op: 'in', values: ['green', 'amber'] },
    });

    expect(quickCheck(truth, { status: 'amber' })).toBe(Verdict.SURVIVED);
    expect(quickCheck(truth, { status: 'red' })).toBe(Verdict.KILLED);
  });

  it('rejects unknown fields', () => {
    expect(() =>
      parseTruthSpec({ kind: 'analytic', statement: 's', lhsName: 'result', rhsExpected: 1, tolerance: 0.1 }),
    ).toThrow(ConfigurationError);
  });
});

describe('safeParseTruthSpec', () => {
  it('returns the truth on success', () => {
    const result = safeParseTruthSpec({ kind: 'analytic', statement: 's', lhsName: 'result', rhsExpected: 1 });

    expect(result.ok).toBe(true);
  });

  it('returns a ConfigurationError for a blank name', () => {
    const result = safeParseTruthSpec({ kind: 'analytic', statement: 's', lhsName: '  ', rhsExpected: 1 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('truth spec.lhsName');
    }
  });
});

describe('compilePredicate', () => {
  it('compares numbers', () => {
    const below = compilePredicate({ op: '<', value: 10 });

    expect(below(3)).toBe(true);
    expect(below(10)).toBe(false);
  });

  it('compares other values structurally', () => {
    const same = compilePredicate({ op: '==', value: { a: [1] } });
    const different = compilePredicate({ op: '!=', value: 0 });

    expect(same({ a: [1] })).toBe(true);
    expect(different(0)).toBe(false);
    expect(different('0')).toBe(true);
  });

  it('treats null, undefined, empty strings and arrays as empty', () => {
    const nonEmpty = compilePredicate({ op: 'non_empty' });

    expect([null, undefined, '', []].map(nonEmpty)).toEqual([false, false, false, false]);
    expect([0, 'a', [1], {}].map(nonEmpty)).toEqual([true, true, true, true]);
  });
});

describe('describePredicate', () => {
  it('renders each operator', () => {
    expect(describePredicate({ op: '>=', value: 0 }, 'balance')).toBe('balance >= 0');
    expect(describePredicate({ op: '==', value: 'ok' }, 'status')).toBe("status == 'ok'");
    expect(describePredicate({ op: 'in', values: ['a', 'b'] }, 'tier')).toBe("tier ∈ [ 'a', 'b' ]");
    expect(describePredicate({ op: 'not_null' }, 'owner')).toBe('owner is not null');
  });
});
