/**
 * GASB 75 Total OPEB Liability roll-forward.
 *
 * Reconciles the liability from the prior measurement date to the current one:
 *
 *   BOY TOL + service cost + interest - benefit payments = expected EOY TOL
 *   expected EOY TOL + assumption change + experience   = actual EOY TOL
 *
 * Experience is the residual that makes the second line hold. In a pure
 * roll-forward (no independent EOY valuation) it is zero and the actual EOY
 * TOL is derived.
 */

import { ConfigurationError, InvariantViolationError } from '../errors';
import { parseIsoDate } from '../helpers/dates';
import { assumptionChangeEffect, durationEstimate, interestCost } from '../helpers/actuarial-math';
import { createPriorValuation, priorActiveFraction } from './prior-valuation';
import {
  DEFAULT_ANOMALY_THRESHOLDS,
  detectAnomalies,
  type AnomalyThresholds,
} from '../validation/anomaly-detector';
import type { PriorValuation, RollForwardInputs, RollForwardResult } from '../types/valuation';

/** Absolute floor of the residual identity check. */
export const RESIDUAL_TOLERANCE = 1e-6;

/** Float rounding allowance per unit of the largest figure in the identity. */
export const RESIDUAL_RELATIVE_TOLERANCE = 1e-12;

export interface RollForwardEngineOptions {
  anomalyThresholds?: Partial<AnomalyThresholds>;
}

function optionalFinite(field: string, value: number | undefined): void {
  if (value !== undefined && !Number.isFinite(value)) {
    throw new ConfigurationError(field, value, 'must be a finite number');
  }
}

export class RollForwardEngine {
  private readonly thresholds: AnomalyThresholds;

  constructor(options: RollForwardEngineOptions = {}) {
    this.thresholds = { ...DEFAULT_ANOMALY_THRESHOLDS, ...options.anomalyThresholds };
  }

  run(prior: PriorValuation, inputs: RollForwardInputs): RollForwardResult {
    this.validateInputs(prior, inputs);

    const benefitPayments = inputs.benefit_payments ?? 0;
    const newRate = inputs.new_discount_rate ?? prior.discount_rate_eoy;

    const boyTol = prior.total_opeb_liability;
    const serviceCost = inputs.service_cost ?? prior.service_cost;
    const interest = interestCost(boyTol, serviceCost, benefitPayments, prior.discount_rate_eoy);
    const expectedEoy = boyTol + serviceCost + interest - benefitPayments;

    const duration =
      inputs.duration ?? durationEstimate(priorActiveFraction(prior), prior.avg_remaining_service_life);
    const assumptionEffect = assumptionChangeEffect(boyTol, duration, newRate - prior.discount_rate_eoy);

    let experience: number;
    let actualEoy: number;
    if (inputs.actual_eoy_tol !== undefined) {
      actualEoy = inputs.actual_eoy_tol;
      experience = actualEoy - expectedEoy - assumptionEffect;
    } else {
      experience = 0;
      actualEoy = expectedEoy + assumptionEffect;
    }

    assertResidualIdentity(actualEoy, expectedEoy, assumptionEffect, experience);

    const warnings = detectAnomalies(
      {
        boy_tol: boyTol,
        expected_eoy_tol: expectedEoy,
        actual_eoy_tol: actualEoy,
        experience_gain_loss: experience,
        new_discount_rate: newRate,
      },
      this.thresholds,
    );

    const result: RollForwardResult = {
      boy_date: prior.valuation_date,
      eoy_date: inputs.current_date,
      boy_tol: boyTol,
      service_cost: serviceCost,
      interest_cost: interest,
      benefit_payments: benefitPayments,
      expected_eoy_tol: expectedEoy,
      assumption_change_effect: assumptionEffect,
      experience_gain_loss: experience,
      actual_eoy_tol: actualEoy,
      prior_discount_rate: prior.discount_rate_eoy,
      new_discount_rate: newRate,
      duration,
      valuation_type: inputs.actual_eoy_tol !== undefined ? 'full-valuation' : 'roll-forward',
      warnings: Object.freeze(warnings),
    };
    return Object.freeze(result);
  }

  private validateInputs(prior: PriorValuation, inputs: RollForwardInputs): void {
    createPriorValuation(prior);
    const priorDate = parseIsoDate('valuation_date', prior.valuation_date);
    const currentDate = parseIsoDate('current_date', inputs.current_date);
    if (currentDate.getTime() <= priorDate.getTime()) {
      throw new ConfigurationError(
        'current_date',
        inputs.current_date,
        `must be after the prior valuation date ${prior.valuation_date}`,
      );
    }

    optionalFinite('benefit_payments', inputs.benefit_payments);
    optionalFinite('actual_eoy_tol', inputs.actual_eoy_tol);
    optionalFinite('service_cost', inputs.service_cost);

    if (inputs.new_discount_rate !== undefined && !(inputs.new_discount_rate > 0 && inputs.new_discount_rate < 1)) {
      throw new ConfigurationError('new_discount_rate', inputs.new_discount_rate, 'must be a fraction between 0 and 1');
    }
    if (inputs.duration !== undefined && !(Number.isFinite(inputs.duration) && inputs.duration >= 0)) {
      throw new ConfigurationError('duration', inputs.duration, 'must be a non-negative number');
    }
  }
}

/**
 * Largest gap the residual identity tolerates: RESIDUAL_TOLERANCE, widened
 * only by float rounding on figures beyond 1e6.
 */
export function residualTolerance(
  actualEoy: number,
  expectedEoy: number,
  assumptionEffect: number,
  experience: number,
): number {
  const scale = Math.max(
    Math.abs(actualEoy),
    Math.abs(expectedEoy),
    Math.abs(assumptionEffect),
    Math.abs(experience),
  );
  return Math.max(RESIDUAL_TOLERANCE, RESIDUAL_RELATIVE_TOLERANCE * scale);
}

/**
 * actual = expected + assumption change + experience, within residualTolerance.
 */
export function assertResidualIdentity(
  actualEoy: number,
  expectedEoy: number,
  assumptionEffect: number,
  experience: number,
): void {
  const gap = actualEoy - (expectedEoy + assumptionEffect + experience);
  if (!(Math.abs(gap) <= residualTolerance(actualEoy, expectedEoy, assumptionEffect, experience))) {
    throw new InvariantViolationError(
      'residual identity',
      `actual EOY TOL ${actualEoy} differs from expected + assumption + experience by ${gap}`,
    );
  }
}
