/**
 * Roll-forward approximation formulas.
 * Pure functions; contracts are checked and reported as configuration errors.
 */

import { ConfigurationError } from '../errors';

/** Blended duration assumed for the retiree block and added to active ARSL. */
export const BASE_DURATION_YEARS = 10;

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(field, value, 'must be a finite number');
  }
}

/**
 * Interest on the mid-year balance: (BOY + SC/2 - BP/2) × rate.
 * The rate is the prior period's ending discount rate.
 */
export function interestCost(
  boyTol: number,
  serviceCost: number,
  benefitPayments: number,
  rate: number,
): number {
  requireFinite('boy_tol', boyTol);
  requireFinite('service_cost', serviceCost);
  requireFinite('benefit_payments', benefitPayments);
  if (!(rate > 0 && rate < 1)) {
    throw new ConfigurationError('discount_rate', rate, 'must be a fraction between 0 and 1');
  }
  if (boyTol < 0) {
    throw new ConfigurationError('boy_tol', boyTol, 'must not be negative');
  }
  return (boyTol + serviceCost / 2 - benefitPayments / 2) * rate;
}

/**
 * Duration approximation of a discount rate change: -D × L × Δr.
 * A rate decrease increases the liability.
 */
export function assumptionChangeEffect(liability: number, duration: number, rateDelta: number): number {
  requireFinite('liability', liability);
  requireFinite('rate_delta', rateDelta);
  if (!Number.isFinite(duration) || duration < 0) {
    throw new ConfigurationError('duration', duration, 'must be a non-negative number');
  }
  return -duration * liability * rateDelta;
}

/**
 * Blended duration proxy: actives at ARSL + 10 years, retirees at 10.
 */
export function durationEstimate(activeFraction: number, arsl: number): number {
  if (!(activeFraction >= 0 && activeFraction <= 1)) {
    throw new ConfigurationError('active_fraction', activeFraction, 'must lie in [0, 1]');
  }
  requireFinite('avg_remaining_service_life', arsl);
  return activeFraction * (arsl + BASE_DURATION_YEARS) + (1 - activeFraction) * BASE_DURATION_YEARS;
}

/**
 * Share of the liability held by actives.
 */
export function activeFraction(tolActives: number, totalLiability: number): number {
  requireFinite('tol_actives', tolActives);
  requireFinite('total_opeb_liability', totalLiability);
  if (totalLiability === 0) {
    throw new ConfigurationError('total_opeb_liability', totalLiability, 'cannot derive an active fraction from a zero liability');
  }
  return tolActives / totalLiability;
}
