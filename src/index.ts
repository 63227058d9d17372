/**
 * @fileoverview Veritas - typed falsification checks
 *
 * ## Quick Start
 *
 * ```typescript
 * import { analytic, Evidence, verify } from 'veritas';
 *
 * const truth = analytic({ statement: 'add(2, 2) equals 4', lhsName: 'result', rhsExpected: 4 });
 * const result = verify(truth, new Evidence({ result: add(2, 2) }));
 * result.verdict; // 'SURVIVED'
 * ```
 *
 * ## Scoped claims
 *
 * ```typescript
 * import { claim, probabilistic } from 'veritas';
 *
 * const ctx = claim(
 *   probabilistic({ statement: 'accuracy > 0.6', metricName: 'accuracy', threshold: 0.6 }),
 *   (c) => {
 *     c.bind({ accuracy: evaluateModel() });
 *   },
 * );
 * ctx.result?.verdict;
 * ```
 *
 * @packageDocumentation
 */

export * from './veritas/index.js';

export {
  VeritasError,
  ConfigurationError,
  MissingEvidenceError,
  ScopeClosedError,
  ClaimKilledError,
  ClaimUncertainError,
  getErrorMessage,
  isVeritasError,
  type ErrorJSON,
  type ScopeOperation,
} from './core/errors.js';

export { Ok, Err, unwrap, type Result, type OkResult, type ErrResult } from './core/result.js';

export {
  DEFAULT_VERIFIER_CONFIG,
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
  VerifierConfigSchema,
  createVerifierConfig,
  loadVerifierConfigFromEnv,
  resolveLogLevel,
  type VerifierConfig,
  type VerifierConfigOverrides,
  type LogLevel,
  type Env,
} from './config/index.js';

export { setLogLevel, getLogLevel, logDebug, logInfo, logWarning, logError } from './telemetry/logger.js';
