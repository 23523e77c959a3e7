/**
 * Types for the vintage amortization ledgers.
 */

/** Which deferred amount a ledger carries. */
export type LedgerKind = 'experience' | 'assumption';

export interface AmortizationEntry {
  /** Measurement year in which the deferred amount originated. */
  readonly vintage_year: number;
  readonly base_amount: number;
  /** Recognition period in years, fixed when the entry is created. */
  readonly arsl: number;
}

export interface LedgerSnapshot {
  kind: LedgerKind;
  window: number;
  /** Most recent vintage first. */
  entries: AmortizationEntry[];
}

export interface PlanLedgerSnapshot {
  window: number;
  experience: AmortizationEntry[];
  assumption: AmortizationEntry[];
}

/**
 * One vintage's recognition across a range of years (Table 7 layout).
 */
export interface RecognitionRow {
  vintage_year: number;
  base_amount: number;
  arsl: number;
  /** Keyed by year. */
  amounts: Record<number, number>;
}

export interface DeferredBalance {
  /** Unrecognized losses. */
  outflows: number;
  /** Unrecognized gains, as a positive figure. */
  inflows: number;
  net: number;
}

export interface PlanAdvanceOutcome {
  vintage_year: number;
  evicted_experience: AmortizationEntry | null;
  evicted_assumption: AmortizationEntry | null;
}
