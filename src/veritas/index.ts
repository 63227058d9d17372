/**
 * @fileoverview Veritas - falsification checks for typed claims
 *
 * - Truths: analytic, modal, empirical and probabilistic claims
 * - Evidence: named observations bound at test time
 * - Verifier: KILLED / SURVIVED / UNCERTAIN verdicts with reasoning
 * - Claim scopes: bind evidence, verify once on close
 *
 * @packageDocumentation
 */

// Types
export {
  Verdict,
  VERDICTS,
  TRUTH_KINDS,
  DIRECTIONS,
  isVerdict,
  type TruthKind,
  type Direction,
  type Predicate,
  type Truth,
  type AnalyticTruth,
  type ModalTruth,
  type EmpiricalTruth,
  type ProbabilisticTruth,
  type FalsificationForm,
  type EvidenceBindings,
  type VerificationResult,
} from './types.js';

// Truth construction
export {
  analytic,
  modal,
  empirical,
  probabilistic,
  createTruth,
  isDirection,
  falsificationForm,
  evidenceNameOf,
  describeTruth,
  formatValue,
  DEFAULT_STATE_VAR,
  DEFAULT_OBSERVATION_VAR,
  DEFAULT_METRIC,
  type AnalyticParams,
  type ModalParams,
  type EmpiricalParams,
  type ProbabilisticParams,
  type TruthParams,
} from './truth.js';

// Evidence
export { Evidence, createEvidence, type EvidenceOptions } from './evidence.js';

// Verification
export { Verifier, verify, quickCheck } from './verifier.js';

// Claim scopes
export {
  ClaimContext,
  openClaim,
  claim,
  claimAsync,
  verified,
  type ClaimOptions,
} from './claim.js';

// Domain truths
export {
  verifyDomain,
  httpResponse,
  modelAccuracy,
  invariantCheck,
  dataGrounding,
  type DomainTruth,
  type HttpResponseInput,
  type ModelAccuracyInput,
} from './extensions.js';

// Declarative specs
export {
  PredicateSpecSchema,
  TruthSpecSchema,
  compilePredicate,
  describePredicate,
  truthFromSpec,
  safeParseTruthSpec,
  parseTruthSpec,
  parseTruthSpecs,
  type PredicateSpec,
  type TruthSpec,
} from './spec_schema.js';

// Reporting
export {
  toJsonValue,
  toResultRecord,
  resultToYaml,
  formatResult,
  type JsonValue,
  type ResultRecord,
} from './report.js';
