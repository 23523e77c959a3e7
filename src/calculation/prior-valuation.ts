/**
 * Construction and derivation of prior valuation snapshots.
 */

import { ConfigurationError } from '../errors';
import { parseIsoDate } from '../helpers/dates';
import { activeFraction } from '../helpers/actuarial-math';
import type { PriorValuation, RollForwardResult } from '../types/valuation';

/** Allowed gap between actives + retirees and the total liability. */
export const SPLIT_TOLERANCE = 0.01;

/** ARSL used when a snapshot does not carry one. */
export const DEFAULT_ARSL = 12;

type NumericField = Exclude<keyof PriorValuation, 'valuation_date' | 'client_name'>;

const NUMERIC_FIELDS: NumericField[] = [
  'total_opeb_liability',
  'tol_actives',
  'tol_retirees',
  'service_cost',
  'discount_rate_boy',
  'discount_rate_eoy',
  'avg_remaining_service_life',
];

/**
 * Validate and freeze a prior valuation.
 */
export function createPriorValuation(values: PriorValuation): PriorValuation {
  parseIsoDate('valuation_date', values.valuation_date);

  for (const field of NUMERIC_FIELDS) {
    if (!Number.isFinite(values[field])) {
      throw new ConfigurationError(field, values[field], 'must be a finite number');
    }
  }

  for (const field of ['discount_rate_boy', 'discount_rate_eoy'] as const) {
    const rate = values[field];
    if (!(rate > 0 && rate < 1)) {
      throw new ConfigurationError(field, rate, 'must be a fraction between 0 and 1');
    }
  }

  if (values.avg_remaining_service_life <= 0) {
    throw new ConfigurationError(
      'avg_remaining_service_life',
      values.avg_remaining_service_life,
      'must be positive',
    );
  }

  const split = values.tol_actives + values.tol_retirees;
  if (Math.abs(split - values.total_opeb_liability) > SPLIT_TOLERANCE) {
    throw new ConfigurationError(
      'tol_actives + tol_retirees',
      split,
      `must equal total_opeb_liability ${values.total_opeb_liability}`,
    );
  }

  return Object.freeze({ ...values });
}

/**
 * Share of the prior liability held by actives.
 */
export function priorActiveFraction(prior: PriorValuation): number {
  return activeFraction(prior.tol_actives, prior.total_opeb_liability);
}

export interface NextPriorOptions {
  /** ARSL assigned at the new measurement date; defaults to the prior's. */
  arsl?: number;
}

/**
 * The valuation the next roll-forward starts from: this period's ending
 * liability, split pro rata to the prior split, at the new discount rate.
 */
export function nextPriorValuation(
  prior: PriorValuation,
  result: RollForwardResult,
  options: NextPriorOptions = {},
): PriorValuation {
  const total = result.actual_eoy_tol;
  const share = prior.total_opeb_liability === 0 ? 0 : priorActiveFraction(prior);
  const tolActives = total * share;

  return createPriorValuation({
    valuation_date: result.eoy_date,
    total_opeb_liability: total,
    tol_actives: tolActives,
    tol_retirees: total - tolActives,
    service_cost: result.service_cost,
    discount_rate_boy: result.prior_discount_rate,
    discount_rate_eoy: result.new_discount_rate,
    avg_remaining_service_life: options.arsl ?? prior.avg_remaining_service_life,
    ...(prior.client_name !== undefined ? { client_name: prior.client_name } : {}),
  });
}
