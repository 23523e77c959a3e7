/**
 * Disclosure figures derived from a roll-forward: the liability at the new
 * rate, ±1% sensitivities and covered payroll.
 */

import { ConfigurationError } from '../errors';
import type { RollForwardDisclosures, RollForwardResult } from '../types/valuation';

const ONE_PERCENT = 0.01;

export const DEFAULT_TREND_DURATION = 5;
export const DEFAULT_PAYROLL_GROWTH = 0.03;

export interface DisclosureOptions {
  trendDuration?: number;
  coveredPayrollPrior?: number;
  payrollGrowthRate?: number;
}

export function computeDisclosures(
  result: RollForwardResult,
  options: DisclosureOptions = {},
): RollForwardDisclosures {
  const trendDuration = options.trendDuration ?? DEFAULT_TREND_DURATION;
  const growth = options.payrollGrowthRate ?? DEFAULT_PAYROLL_GROWTH;

  if (!Number.isFinite(trendDuration) || trendDuration < 0) {
    throw new ConfigurationError('trend_duration', trendDuration, 'must be a non-negative number');
  }
  if (!Number.isFinite(growth) || growth <= -1) {
    throw new ConfigurationError('payroll_growth_rate', growth, 'must be a number greater than -1');
  }

  const eoy = result.actual_eoy_tol;

  let coveredPayroll: number | null = null;
  if (options.coveredPayrollPrior !== undefined) {
    if (!Number.isFinite(options.coveredPayrollPrior) || options.coveredPayrollPrior < 0) {
      throw new ConfigurationError('covered_payroll', options.coveredPayrollPrior, 'must be a non-negative number');
    }
    coveredPayroll = options.coveredPayrollPrior * (1 + growth);
  }

  return {
    boy_tol_new_rate: result.boy_tol + result.assumption_change_effect,
    sensitivity_discount_plus_1: eoy * (1 - result.duration * ONE_PERCENT),
    sensitivity_discount_minus_1: eoy * (1 + result.duration * ONE_PERCENT),
    sensitivity_trend_plus_1: eoy * (1 + trendDuration * ONE_PERCENT),
    sensitivity_trend_minus_1: eoy * (1 - trendDuration * ONE_PERCENT),
    covered_payroll: coveredPayroll,
    tol_percent_of_covered_payroll: coveredPayroll ? eoy / coveredPayroll : null,
  };
}
