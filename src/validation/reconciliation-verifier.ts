/**
 * Post-run checks on a roll-forward and the ledgers it advanced.
 */

import type { Operation } from 'fast-json-patch';
import { residualTolerance } from '../calculation/roll-forward-engine';
import { measurementYear } from '../helpers/dates';
import { verifyLedgerPatch } from './ledger-patch';
import type { PlanLedgers } from '../ledger/plan-ledgers';
import type { PlanLedgerSnapshot } from '../types/ledger';
import type { RollForwardResult } from '../types/valuation';

export interface VerificationCheck {
  expected: unknown;
  actual: unknown;
  passed: boolean;
}

export interface VerificationReport {
  passed: boolean;
  checks: Record<string, VerificationCheck>;
}

export interface VerificationContext {
  benefitChanges: string;
  /** Ledger before the advance and the patch recorded for it. */
  ledgerChange?: {
    before: PlanLedgerSnapshot;
    operations: readonly Operation[];
  };
}

export function verifyRollForward(
  result: RollForwardResult,
  ledgers: PlanLedgers,
  context: VerificationContext,
): VerificationReport {
  const checks: Record<string, VerificationCheck> = {};

  const reconciled = result.expected_eoy_tol + result.assumption_change_effect + result.experience_gain_loss;
  const gap = Math.abs(result.actual_eoy_tol - reconciled);
  checks.residual_identity = {
    expected: result.actual_eoy_tol,
    actual: reconciled,
    passed:
      gap <=
      residualTolerance(
        result.actual_eoy_tol,
        result.expected_eoy_tol,
        result.assumption_change_effect,
        result.experience_gain_loss,
      ),
  };

  if (result.valuation_type === 'roll-forward') {
    checks.roll_forward_experience_zero = {
      expected: 0,
      actual: result.experience_gain_loss,
      passed: result.experience_gain_loss === 0,
    };
  }

  const year = measurementYear(result.eoy_date);
  for (const ledger of [ledgers.experience, ledgers.assumption]) {
    checks[`${ledger.kind}_ledger_window`] = {
      expected: `<= ${ledger.window} entries`,
      actual: ledger.size,
      passed: ledger.size <= ledger.window,
    };
    checks[`${ledger.kind}_ledger_latest_vintage`] = {
      expected: year,
      actual: ledger.latestVintage,
      passed: ledger.latestVintage === year,
    };
  }

  if (context.ledgerChange) {
    const patchErrors = verifyLedgerPatch(
      context.ledgerChange.before,
      context.ledgerChange.operations,
      ledgers.toSnapshot(),
    );
    checks.ledger_patch_reproduces_ledger = {
      expected: [],
      actual: patchErrors,
      passed: patchErrors.length === 0,
    };
  }

  checks.new_discount_rate_is_number = {
    expected: 'numeric value',
    actual: result.new_discount_rate,
    passed: Number.isFinite(result.new_discount_rate),
  };

  checks.benefit_changes_has_value = {
    expected: 'non-empty',
    actual: context.benefitChanges,
    passed: context.benefitChanges.trim() !== '',
  };

  return {
    passed: Object.values(checks).every(c => c.passed),
    checks,
  };
}
