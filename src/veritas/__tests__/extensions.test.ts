import { describe, it, expect, vi } from 'vitest';
import {
  dataGrounding,
  httpResponse,
  invariantCheck,
  modelAccuracy,
  verifyDomain,
} from '../extensions.js';
import { Verdict } from '../types.js';
import { Verifier } from '../verifier.js';

interface Account {
  balance: number;
}

function isAccount(value: unknown): value is Account {
  return typeof value === 'object' && value !== null && 'balance' in value && typeof value.balance === 'number';
}

describe('httpResponse', () => {
  const health = httpResponse('/health', 200);

  it('maps to an analytic truth on status_code', () => {
    const truth = health.toTruth();

    expect(health.domain).toBe('api');
    expect(truth.statement).toBe('GET /health returns 200');
    expect(truth.lhsName).toBe('status_code');
  });

  it('verifies the received status code', () => {
    const ok = verifyDomain(health, { statusCode: 200, metadata: { latencyMs: 12 } });
    const down = verifyDomain(health, { statusCode: 503 });

    expect(ok.verdict).toBe(Verdict.SURVIVED);
    expect(ok.source).toBe('HTTP /health');
    expect(down.verdict).toBe(Verdict.KILLED);
    expect(down.reasoning).toBe('Falsification condition met: status_code ≠ 200 (status_code=503)');
  });
});

describe('modelAccuracy', () => {
  const accuracy = modelAccuracy('classifier', 0.8);

  it('requires accuracy at or above the threshold', () => {
    expect(accuracy.toTruth().direction).toBe('>=');
    expect(verifyDomain(accuracy, { accuracy: 0.8 }).verdict).toBe(Verdict.SURVIVED);
    expect(verifyDomain(accuracy, { accuracy: 0.79 }).verdict).toBe(Verdict.KILLED);
  });

  it('uses the supplied verifier and names the model as source', () => {
    const verifier = new Verifier();
    const spy = vi.spyOn(verifier, 'verify');

    const result = verifyDomain(accuracy, { accuracy: 0.9 }, verifier);

    expect(spy).toHaveBeenCalledTimes(1);
    expect(result.source).toBe('model evaluation: classifier');
  });
});

describe('invariantCheck', () => {
  const nonNegative = invariantCheck('balance non-negative', (account: Account) => account.balance >= 0, isAccount);

  it('survives states that keep the invariant', () => {
    expect(verifyDomain(nonNegative, { balance: 10 }).verdict).toBe(Verdict.SURVIVED);
  });

  it('is killed by a violating state', () => {
    const result = verifyDomain(nonNegative, { balance: -5 });

    expect(result.verdict).toBe(Verdict.KILLED);
    expect(result.form.formula).toBe('¬(balance non-negative)');
  });

  it('is uncertain for states of the wrong shape', () => {
    const verifier = new Verifier();
    const truth = nonNegative.toTruth();
    const evidence = nonNegative.collect({ balance: 1 }).bind({ state: 'oops' });

    const result = verifier.verify(truth, evidence);

    expect(result.verdict).toBe(Verdict.UNCERTAIN);
    expect(result.reasoning).toBe(
      "Invariant could not be evaluated for state='oops': state does not have the shape balance non-negative expects",
    );
  });
});

describe('dataGrounding', () => {
  const grounding = dataGrounding('caching halves latency', 'benchmark');

  it('survives when support is present', () => {
    expect(verifyDomain(grounding, 'bench/latency.md').verdict).toBe(Verdict.SURVIVED);
  });

  it.each([null, undefined, ''])('is killed when support is %j', (support) => {
    const result = verifyDomain(grounding, support);

    expect(result.verdict).toBe(Verdict.KILLED);
    expect(result.reasoning.startsWith('Observation contradicts claim: No benchmark found for: caching halves latency (support=')).toBe(true);
  });

  it('names the missing support in the reasoning', () => {
    expect(verifyDomain(grounding, null).reasoning).toBe(
      'Observation contradicts claim: No benchmark found for: caching halves latency (support=null)',
    );
  });
});
