/**
 * @fileoverview Evidence binding
 *
 * Evidence accumulates named observations for one evaluation pass. Rebinding
 * a name replaces its value (last write wins). A name bound to `null` or
 * `undefined` still counts as bound.
 *
 * Snapshots hold deep-frozen copies, so a result keeps the evidence it was
 * judged on even when the caller mutates its own objects afterwards.
 *
 * @packageDocumentation
 */

import { MissingEvidenceError } from '../core/errors.js';
import type { EvidenceBindings } from './types.js';

export interface EvidenceOptions {
  /** How the evidence was gathered, e.g. "unit test: add()" */
  source?: string;
  metadata?: Record<string, unknown>;
}

export class Evidence {
  private readonly bindings = new Map<string, unknown>();
  readonly source?: string;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(initial: Record<string, unknown> = {}, options: EvidenceOptions = {}) {
    this.source = options.source;
    this.metadata = Object.freeze({ ...options.metadata });
    this.bind(initial);
  }

  /** Merge bindings; existing names are overwritten. */
  bind(bindings: Record<string, unknown>): this {
    for (const [name, value] of Object.entries(bindings)) {
      this.bindings.set(name, value);
    }
    return this;
  }

  /** Bind a single value and hand it back, for inline use. */
  observe<T>(name: string, value: T): T {
    this.bindings.set(name, value);
    return value;
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * @throws MissingEvidenceError when `name` was never bound
   */
  get(name: string): unknown {
    if (!this.bindings.has(name)) {
      throw new MissingEvidenceError(name);
    }
    return this.bindings.get(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  get size(): number {
    return this.bindings.size;
  }

  /** Frozen copy of the current bindings; see `copyBinding`. */
  snapshot(): EvidenceBindings {
    return Object.freeze(
      Object.fromEntries([...this.bindings].map(([name, value]) => [name, copyBinding(value)])),
    );
  }
}

// ============================================================================
// SNAPSHOT COPIES
// ============================================================================

const CLONEABLE_PROTOTYPES: ReadonlySet<unknown> = new Set([
  null,
  Object.prototype,
  Array.prototype,
  Map.prototype,
  Set.prototype,
  Date.prototype,
]);

/**
 * Plain data (objects, arrays, maps, sets, dates) is deep-copied with
 * `structuredClone` and deep-frozen. Class instances, functions and anything
 * else the clone algorithm rejects are kept by reference and left unfrozen,
 * since they belong to the caller.
 */
function copyBinding(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (!CLONEABLE_PROTOTYPES.has(Object.getPrototypeOf(value))) {
    return value;
  }
  let copy: unknown;
  try {
    copy = structuredClone(value);
  } catch (error) {
    if (error instanceof Error && error.name === 'DataCloneError') return value;
    throw error;
  }
  return deepFreezeValue(copy);
}

function deepFreezeValue(value: unknown, visited = new WeakSet<object>()): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (visited.has(value)) {
    return value;
  }
  visited.add(value);
  for (const entry of Object.values(value)) {
    deepFreezeValue(entry, visited);
  }
  return Object.freeze(value);
}

export function createEvidence(bindings: Record<string, unknown> = {}, options?: EvidenceOptions): Evidence {
  return new Evidence(bindings, options);
}
