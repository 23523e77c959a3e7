/**
 * Types for the report of one roll-forward run.
 */

import type { Operation } from 'fast-json-patch';
import type { PlanDeferredBalances, PlanRecognition, PlanRecognitionSchedule } from '../ledger/plan-ledgers';
import type { VerificationReport } from '../validation/reconciliation-verifier';
import type { AmortizationEntry, PlanLedgerSnapshot } from './ledger';
import type { PriorValuation, RollForwardDisclosures, RollForwardResult } from './valuation';

export interface RunReport {
  client_name: string | null;
  timestamp: string;
  benefit_changes: string;
  prior: PriorValuation;
  result: RollForwardResult;
  disclosures: RollForwardDisclosures;
  ledger: PlanLedgerSnapshot;
  evicted: {
    experience: AmortizationEntry | null;
    assumption: AmortizationEntry | null;
  };
  /** RFC 6902 operations from the prior ledger snapshot to the new one. */
  ledger_patch: Operation[];
  recognition: PlanRecognition;
  /** This year and the following window - 1 years. */
  recognition_schedule: PlanRecognitionSchedule;
  deferred_balances: PlanDeferredBalances;
  verification: VerificationReport | null;
}
