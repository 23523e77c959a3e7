/**
 * Flags results that are valid but actuarially unusual.
 */

import type { Anomaly } from '../types/valuation';

export interface AnomalyThresholds {
  /** Experience beyond this share of BOY TOL is flagged. */
  maxExperienceShare: number;
  /** Discount rates below this are flagged. */
  minDiscountRate: number;
}

export const DEFAULT_ANOMALY_THRESHOLDS: AnomalyThresholds = {
  maxExperienceShare: 0.1,
  minDiscountRate: 0.01,
};

export interface AnomalyFigures {
  boy_tol: number;
  expected_eoy_tol: number;
  actual_eoy_tol: number;
  experience_gain_loss: number;
  new_discount_rate: number;
}

export function detectAnomalies(
  figures: AnomalyFigures,
  thresholds: AnomalyThresholds = DEFAULT_ANOMALY_THRESHOLDS,
): Anomaly[] {
  const anomalies: Anomaly[] = [];

  for (const field of ['expected_eoy_tol', 'actual_eoy_tol'] as const) {
    if (figures[field] < 0) {
      anomalies.push({
        level: 'WARNING',
        code: 'NEGATIVE_TOL',
        field,
        value: figures[field],
        message: `${field} is negative (${figures[field].toFixed(2)})`,
      });
    }
  }

  if (figures.new_discount_rate < thresholds.minDiscountRate) {
    anomalies.push({
      level: 'WARNING',
      code: 'LOW_DISCOUNT_RATE',
      field: 'new_discount_rate',
      value: figures.new_discount_rate,
      message: `Discount rate ${formatPercent(figures.new_discount_rate)} is below ${formatPercent(thresholds.minDiscountRate)}`,
    });
  }

  const limit = Math.abs(figures.boy_tol) * thresholds.maxExperienceShare;
  if (Math.abs(figures.experience_gain_loss) > limit) {
    anomalies.push({
      level: 'WARNING',
      code: 'LARGE_EXPERIENCE',
      field: 'experience_gain_loss',
      value: figures.experience_gain_loss,
      message:
        `Experience (gain)/loss ${figures.experience_gain_loss.toFixed(2)} exceeds ` +
        `${formatPercent(thresholds.maxExperienceShare)} of BOY TOL`,
    });
  }

  return anomalies;
}

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}
