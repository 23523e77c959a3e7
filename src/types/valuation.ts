/**
 * Types for valuation snapshots and roll-forward results.
 */

/** Calendar date as YYYY-MM-DD. */
export type IsoDate = string;

export type ValuationType = 'roll-forward' | 'full-valuation';

/**
 * Results of one prior measurement period. Read-only input to exactly one
 * roll-forward.
 */
export interface PriorValuation {
  readonly valuation_date: IsoDate;
  readonly total_opeb_liability: number;
  readonly tol_actives: number;
  readonly tol_retirees: number;
  readonly service_cost: number;
  readonly discount_rate_boy: number;
  readonly discount_rate_eoy: number;
  readonly avg_remaining_service_life: number;
  readonly client_name?: string;
}

/**
 * Prior valuation as persisted. The date and ARSL may be absent.
 */
export interface PriorValuationSnapshot {
  valuation_date?: IsoDate;
  total_opeb_liability: number;
  tol_actives: number;
  tol_retirees: number;
  service_cost: number;
  discount_rate_boy: number;
  discount_rate_eoy: number;
  avg_remaining_service_life?: number;
  client_name?: string;
}

export interface RollForwardInputs {
  current_date: IsoDate;
  /** Benefit payments made during the period. Defaults to 0. */
  benefit_payments?: number;
  /** Discount rate at the new measurement date. Defaults to the prior EOY rate. */
  new_discount_rate?: number;
  /** Present only for a full valuation. */
  actual_eoy_tol?: number;
  /** Overrides the blended duration estimate. */
  duration?: number;
  /** Full-valuation service cost; a roll-forward reuses the prior year's. */
  service_cost?: number;
}

export type AnomalyCode = 'NEGATIVE_TOL' | 'LOW_DISCOUNT_RATE' | 'LARGE_EXPERIENCE';

export interface Anomaly {
  level: 'WARNING';
  code: AnomalyCode;
  field: string;
  value: number;
  message: string;
}

export interface RollForwardResult {
  readonly boy_date: IsoDate;
  readonly eoy_date: IsoDate;
  readonly boy_tol: number;
  readonly service_cost: number;
  readonly interest_cost: number;
  readonly benefit_payments: number;
  /** Before assumption and experience adjustments. */
  readonly expected_eoy_tol: number;
  readonly assumption_change_effect: number;
  readonly experience_gain_loss: number;
  readonly actual_eoy_tol: number;
  readonly prior_discount_rate: number;
  readonly new_discount_rate: number;
  readonly duration: number;
  readonly valuation_type: ValuationType;
  readonly warnings: readonly Anomaly[];
}

/**
 * Figures disclosed alongside the reconciliation.
 */
export interface RollForwardDisclosures {
  boy_tol_new_rate: number;
  sensitivity_discount_plus_1: number;
  sensitivity_discount_minus_1: number;
  sensitivity_trend_plus_1: number;
  sensitivity_trend_minus_1: number;
  covered_payroll: number | null;
  tol_percent_of_covered_payroll: number | null;
}
