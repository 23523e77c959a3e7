/**
 * Roll-forward orchestration: load the prior period, reconcile, advance the
 * ledgers, verify and write the outputs.
 */

import type { Config } from './config';
import { RollForwardEngine } from './calculation/roll-forward-engine';
import { computeDisclosures } from './calculation/disclosures';
import { nextPriorValuation } from './calculation/prior-valuation';
import { loadPlanLedgers, loadPriorValuation } from './helpers/snapshot-loader';
import { PlanLedgers } from './ledger/plan-ledgers';
import { diffLedgerSnapshots } from './validation/ledger-patch';
import { verifyRollForward, type VerificationReport } from './validation/reconciliation-verifier';
import {
  formatRate,
  printLedger,
  printLedgerPatch,
  printRecognitionSchedule,
  printRollForwardSummary,
  printVerification,
} from './output/console-reporter';
import { writeJsonFile, writeJsonReport } from './output/json-reporter';
import type { RollForwardInputs } from './types/valuation';
import type { RunReport } from './types/results';

/**
 * Run one roll-forward. Returns the process exit status.
 */
export function run(config: Config): number {
  console.log('=== GASB 75 OPEB Roll-Forward ===');
  console.log(`Prior:  ${config.prior}`);
  if (config.ledger) {
    console.log(`Ledger: ${config.ledger}`);
  }

  const prior = loadPriorValuation(config.prior, {
    valuationDate: config.priorDate,
    discountRateEoy: config.priorRate,
  });
  const newRate = config.newRate ?? prior.discount_rate_eoy;
  console.log(`Period: ${prior.valuation_date} → ${config.newDate}`);
  console.log(`Rates:  ${formatRate(prior.discount_rate_eoy)} → ${formatRate(newRate)}\n`);

  const engine = new RollForwardEngine({
    anomalyThresholds: {
      maxExperienceShare: config.maxExperienceShare,
      minDiscountRate: config.minDiscountRate,
    },
  });
  const inputs: RollForwardInputs = {
    current_date: config.newDate,
    benefit_payments: config.benefitPayments,
    new_discount_rate: newRate,
    actual_eoy_tol: config.actualEoyTol,
    duration: config.duration,
    service_cost: config.serviceCost,
  };
  const result = engine.run(prior, inputs);

  const disclosures = computeDisclosures(result, {
    trendDuration: config.trendDuration,
    coveredPayrollPrior: config.coveredPayroll,
    payrollGrowthRate: config.payrollGrowth,
  });

  const ledgers = config.ledger ? loadPlanLedgers(config.ledger) : PlanLedgers.create(config.window);
  const before = ledgers.toSnapshot();
  const arsl = config.arsl ?? Math.max(1, Math.round(prior.avg_remaining_service_life));
  const advance = ledgers.advance(result, arsl);
  const after = ledgers.toSnapshot();
  const patch = diffLedgerSnapshots(before, after);
  const schedule = ledgers.recognitionSchedule(advance.vintage_year, advance.vintage_year + ledgers.window - 1);

  let verification: VerificationReport | null = null;
  if (config.verify) {
    verification = verifyRollForward(result, ledgers, {
      benefitChanges: config.benefitChanges,
      ledgerChange: { before, operations: patch },
    });
  }

  const report: RunReport = {
    client_name: prior.client_name ?? null,
    timestamp: new Date().toISOString(),
    benefit_changes: config.benefitChanges,
    prior,
    result,
    disclosures,
    ledger: after,
    evicted: {
      experience: advance.evicted_experience,
      assumption: advance.evicted_assumption,
    },
    ledger_patch: patch,
    recognition: ledgers.recognizedAmountThisPeriod(),
    recognition_schedule: schedule,
    deferred_balances: ledgers.deferredBalances(),
    verification,
  };

  printRollForwardSummary(report);

  if (config.verbose) {
    printLedger(ledgers.experience);
    printLedger(ledgers.assumption);
    printRecognitionSchedule(schedule);
    printLedgerPatch(patch);
  }

  if (verification) {
    printVerification(verification);
  }

  if (config.output) {
    writeJsonReport(report, config.output);
  }
  if (config.ledgerOutput) {
    writeJsonFile(after, config.ledgerOutput, 'Ledger');
  }
  if (config.nextPrior) {
    writeJsonFile(nextPriorValuation(prior, result, { arsl: config.arsl }), config.nextPrior, 'Next prior valuation');
  }

  return verification && !verification.passed ? 1 : 0;
}
