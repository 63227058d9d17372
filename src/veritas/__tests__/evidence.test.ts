import { describe, it, expect } from 'vitest';
import { MissingEvidenceError } from '../../core/errors.js';
import { Evidence, createEvidence } from '../evidence.js';

describe('Evidence', () => {
  it('merges bindings across calls', () => {
    const evidence = new Evidence({ x: 1 });
    evidence.bind({ y: 2 }).bind({ z: 3 });

    expect(evidence.names()).toEqual(['x', 'y', 'z']);
    expect(evidence.size).toBe(3);
  });

  it('replaces a value when a name is rebound', () => {
    const evidence = createEvidence({ result: 5 });
    evidence.bind({ result: 4 });

    expect(evidence.get('result')).toBe(4);
    expect(evidence.size).toBe(1);
  });

  it('treats null and undefined as bound values', () => {
    const evidence = new Evidence({ blocker: null, missing: undefined });

    expect(evidence.has('blocker')).toBe(true);
    expect(evidence.get('blocker')).toBeNull();
    expect(evidence.has('missing')).toBe(true);
    expect(evidence.get('missing')).toBeUndefined();
  });

  it('signals MissingEvidenceError for unbound names', () => {
    const evidence = new Evidence();

    expect(evidence.has('result')).toBe(false);
    expect(() => evidence.get('result')).toThrow(MissingEvidenceError);
  });

  it('returns observed values for chaining', () => {
    const evidence = new Evidence();
    const doubled = evidence.observe('intermediate', 5) * 2;

    expect(doubled).toBe(10);
    expect(evidence.get('intermediate')).toBe(5);
  });

  it('snapshots are frozen and unaffected by later binds', () => {
    const evidence = new Evidence({ result: 4 });
    const snapshot = evidence.snapshot();
    evidence.bind({ result: 5, extra: true });

    expect(snapshot).toEqual({ result: 4 });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('snapshots copy plain data and keep class instances and functions by reference', () => {
    class Counter {
      count = 1;
    }
    const counter = new Counter();
    const nested = { items: [1, 2] };
    const withCallback = { callback: () => 1 };

    const snapshot = new Evidence({ counter, nested, withCallback }).snapshot();
    nested.items.push(3);

    expect(snapshot.nested).toEqual({ items: [1, 2] });
    expect(Object.isFrozen(snapshot.nested)).toBe(true);
    expect(snapshot.counter).toBe(counter);
    expect(Object.isFrozen(counter)).toBe(false);
    expect(snapshot.withCallback).toBe(withCallback);
    expect(Object.isFrozen(withCallback)).toBe(false);
  });

  it('snapshots cyclic values', () => {
    const node: { name: string; self?: unknown } = { name: 'root' };
    node.self = node;

    const copy = new Evidence({ node }).snapshot().node;

    expect(copy).not.toBe(node);
    expect(copy).toEqual(node);
    expect(Object.isFrozen(copy)).toBe(true);
  });

  it('keeps source and metadata', () => {
    const evidence = new Evidence({}, { source: 'unit test', metadata: { file: 'math.test.ts' } });

    expect(evidence.source).toBe('unit test');
    expect(evidence.metadata).toEqual({ file: 'math.test.ts' });
    expect(Object.isFrozen(evidence.metadata)).toBe(true);
  });
});
