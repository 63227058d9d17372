/**
 * @fileoverview Result reporting
 *
 * Turns a VerificationResult into data the surrounding tooling can store:
 * a JSON-safe record, a YAML document, or a short text block.
 */

import YAML from 'yaml';
import { formatValue } from './truth.js';
import type { FalsificationForm, TruthKind, Verdict, VerificationResult } from './types.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface ResultRecord {
  statement: string;
  kind: TruthKind;
  verdict: Verdict;
  reasoning: string;
  falsification: Pick<FalsificationForm, 'formula' | 'description'>;
  evidence: Record<string, JsonValue>;
  source?: string;
  trace: string[];
}

/**
 * Values JSON cannot carry (functions, bigint, undefined, symbols, non-finite
 * numbers, class instances) are rendered with `formatValue`. A reference back
 * to an enclosing object is rendered as `[Circular]`.
 */
export function toJsonValue(value: unknown): JsonValue {
  return toJsonValueWithin(value, new WeakSet<object>());
}

function toJsonValueWithin(value: unknown, ancestors: WeakSet<object>): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : formatValue(value);
  }
  if (typeof value !== 'object') {
    return formatValue(value);
  }
  const isArray = Array.isArray(value);
  if (!isArray && Object.getPrototypeOf(value) !== Object.prototype) {
    return formatValue(value);
  }
  if (ancestors.has(value)) {
    return '[Circular]';
  }
  ancestors.add(value);
  const converted: JsonValue = isArray
    ? value.map((item) => toJsonValueWithin(item, ancestors))
    : Object.fromEntries(
        Object.entries(value).map(([key, item]): [string, JsonValue] => [key, toJsonValueWithin(item, ancestors)]),
      );
  ancestors.delete(value);
  return converted;
}

export function toResultRecord(result: VerificationResult): ResultRecord {
  const evidence: Record<string, JsonValue> = Object.fromEntries(
    Object.entries(result.evidence).map(([name, value]): [string, JsonValue] => [name, toJsonValue(value)]),
  );
  return {
    statement: result.statement,
    kind: result.kind,
    verdict: result.verdict,
    reasoning: result.reasoning,
    falsification: {
      formula: result.form.formula,
      description: result.form.description,
    },
    evidence,
    ...(result.source !== undefined && { source: result.source }),
    trace: [...result.trace],
  };
}

export function resultToYaml(result: VerificationResult): string {
  return YAML.stringify(toResultRecord(result));
}

export function formatResult(result: VerificationResult): string {
  const lines = [`Verdict: ${result.verdict}`];
  if (result.reasoning) {
    lines.push(`Reasoning: ${result.reasoning}`);
  }
  if (Object.keys(result.evidence).length > 0) {
    lines.push(`Evidence: ${formatValue(result.evidence)}`);
  }
  return lines.join('\n');
}
