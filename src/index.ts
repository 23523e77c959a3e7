/**
 * Library entry: the roll-forward engine, the amortization ledgers and their
 * snapshot helpers. The command line lives in ./cli.
 */

export { ConfigurationError, InvariantViolationError, SnapshotError } from './errors';
export { interestCost, assumptionChangeEffect, durationEstimate, activeFraction } from './helpers/actuarial-math';
export {
  createPriorValuation,
  nextPriorValuation,
  priorActiveFraction,
  type NextPriorOptions,
} from './calculation/prior-valuation';
export {
  RollForwardEngine,
  assertResidualIdentity,
  residualTolerance,
  type RollForwardEngineOptions,
} from './calculation/roll-forward-engine';
export { computeDisclosures, type DisclosureOptions } from './calculation/disclosures';
export { detectAnomalies, DEFAULT_ANOMALY_THRESHOLDS, type AnomalyThresholds } from './validation/anomaly-detector';
export { VintageAmortizationLedger, DEFAULT_WINDOW } from './ledger/vintage-ledger';
export {
  PlanLedgers,
  type PlanRecognition,
  type PlanDeferredBalances,
  type PlanRecognitionSchedule,
} from './ledger/plan-ledgers';
export { diffLedgerSnapshots, applyLedgerPatch, verifyLedgerPatch } from './validation/ledger-patch';
export { compareLedgerSnapshots } from './validation/ledger-comparator';
export { verifyRollForward, type VerificationReport } from './validation/reconciliation-verifier';
export {
  loadPriorValuation,
  loadPlanLedgers,
  parsePriorValuationSnapshot,
  parsePlanLedgerSnapshot,
  toPriorValuation,
} from './helpers/snapshot-loader';
export type * from './types/valuation';
export type * from './types/ledger';
