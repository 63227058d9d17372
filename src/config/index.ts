/**
 * @fileoverview Veritas Configuration
 *
 * Verifier tolerances and strictness, plus the log threshold. Values come from
 * explicit overrides or from `VERITAS_*` environment variables.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

// ============================================================================
// VERIFIER CONFIG
// ============================================================================

export interface VerifierConfig {
  /** Absolute tolerance for numeric equality */
  absoluteTolerance: number;

  /** Relative tolerance for numeric equality, scaled by the expected value */
  relativeTolerance: number;

  /** Treat UNCERTAIN as a failure in `verified` wrappers */
  strict: boolean;
}

export const DEFAULT_VERIFIER_CONFIG: Readonly<VerifierConfig> = Object.freeze({
  absoluteTolerance: 1e-9,
  relativeTolerance: 1e-9,
  strict: false,
});

const ToleranceSchema = z.number().finite().nonnegative();

export const VerifierConfigSchema = z.object({
  absoluteTolerance: ToleranceSchema.optional(),
  relativeTolerance: ToleranceSchema.optional(),
  strict: z.boolean().optional(),
}).strict();

export type VerifierConfigOverrides = z.input<typeof VerifierConfigSchema>;

/**
 * Merge overrides onto the defaults. Throws ConfigurationError for negative or
 * non-finite tolerances and unknown keys.
 */
export function createVerifierConfig(overrides: VerifierConfigOverrides = {}): Readonly<VerifierConfig> {
  const parsed = VerifierConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'verifier config';
    throw new ConfigurationError(field, issue?.message ?? 'invalid value');
  }
  return Object.freeze({
    absoluteTolerance: parsed.data.absoluteTolerance ?? DEFAULT_VERIFIER_CONFIG.absoluteTolerance,
    relativeTolerance: parsed.data.relativeTolerance ?? DEFAULT_VERIFIER_CONFIG.relativeTolerance,
    strict: parsed.data.strict ?? DEFAULT_VERIFIER_CONFIG.strict,
  });
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

export type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(key, `expected a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === '1' || raw === 'true' || raw === 'yes') return true;
  if (raw === '0' || raw === 'false' || raw === 'no') return false;
  throw new ConfigurationError(key, `expected a boolean, got "${raw}"`);
}

/**
 * Build a verifier config from `VERITAS_ATOL`, `VERITAS_RTOL` and
 * `VERITAS_STRICT`. Unset variables keep their defaults.
 */
export function loadVerifierConfigFromEnv(env: Env = process.env): Readonly<VerifierConfig> {
  const overrides: VerifierConfigOverrides = {};
  const atol = readNumber(env, 'VERITAS_ATOL');
  const rtol = readNumber(env, 'VERITAS_RTOL');
  const strict = readBoolean(env, 'VERITAS_STRICT');
  if (atol !== undefined) overrides.absoluteTolerance = atol;
  if (rtol !== undefined) overrides.relativeTolerance = rtol;
  if (strict !== undefined) overrides.strict = strict;
  return createVerifierConfig(overrides);
}

// ============================================================================
// LOG LEVEL
// ============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Read `VERITAS_LOG_LEVEL`. Unknown values fall back to the default so a typo
 * never breaks verification.
 */
export function resolveLogLevel(env: Env = process.env): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.VERITAS_LOG_LEVEL?.trim().toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}
