/**
 * The experience and assumption-change ledgers of one plan, advanced together
 * from a roll-forward result.
 */

import { ConfigurationError } from '../errors';
import { measurementYear } from '../helpers/dates';
import { DEFAULT_WINDOW, VintageAmortizationLedger } from './vintage-ledger';
import type { RollForwardResult } from '../types/valuation';
import type { DeferredBalance, PlanAdvanceOutcome, PlanLedgerSnapshot, RecognitionRow } from '../types/ledger';

/** Experience bases smaller than this in absolute value are recorded as 0. */
export const EXPERIENCE_ROUNDING_FLOOR = 1;

export interface PlanRecognition {
  experience: number;
  assumption: number;
  total: number;
}

export interface PlanDeferredBalances {
  experience: DeferredBalance;
  assumption: DeferredBalance;
  total: DeferredBalance;
}

/** Table 7 layout: per-vintage recognition for each year of a range. */
export interface PlanRecognitionSchedule {
  from_year: number;
  to_year: number;
  experience: RecognitionRow[];
  assumption: RecognitionRow[];
}

export class PlanLedgers {
  constructor(
    readonly experience: VintageAmortizationLedger,
    readonly assumption: VintageAmortizationLedger,
  ) {
    if (experience.kind !== 'experience' || assumption.kind !== 'assumption') {
      throw new ConfigurationError('kind', [experience.kind, assumption.kind], 'expected an experience and an assumption ledger');
    }
    if (experience.window !== assumption.window) {
      throw new ConfigurationError('window', [experience.window, assumption.window], 'both ledgers must share one window');
    }
    if (experience.latestVintage !== assumption.latestVintage) {
      throw new ConfigurationError(
        'latest_vintage',
        [experience.latestVintage, assumption.latestVintage],
        'experience and assumption ledgers must end on the same vintage',
      );
    }
  }

  static create(window: number = DEFAULT_WINDOW): PlanLedgers {
    return new PlanLedgers(
      new VintageAmortizationLedger('experience', window),
      new VintageAmortizationLedger('assumption', window),
    );
  }

  get window(): number {
    return this.experience.window;
  }

  get latestVintage(): number | null {
    return this.experience.latestVintage;
  }

  /**
   * Add this period's experience and assumption-change bases. Both ledgers
   * are checked before either is touched.
   */
  advance(result: RollForwardResult, arsl: number): PlanAdvanceOutcome {
    const vintage = measurementYear(result.eoy_date);
    const experienceBase =
      Math.abs(result.experience_gain_loss) < EXPERIENCE_ROUNDING_FLOOR ? 0 : result.experience_gain_loss;
    const assumptionBase = result.assumption_change_effect;

    this.experience.validateAdvance(vintage, experienceBase, arsl);
    this.assumption.validateAdvance(vintage, assumptionBase, arsl);

    return {
      vintage_year: vintage,
      evicted_experience: this.experience.advanceYear(vintage, experienceBase, arsl),
      evicted_assumption: this.assumption.advanceYear(vintage, assumptionBase, arsl),
    };
  }

  recognizedAmountThisPeriod(): PlanRecognition {
    const experience = this.experience.recognizedAmountThisPeriod();
    const assumption = this.assumption.recognizedAmountThisPeriod();
    return { experience, assumption, total: experience + assumption };
  }

  recognitionSchedule(fromYear: number, toYear: number): PlanRecognitionSchedule {
    return {
      from_year: fromYear,
      to_year: toYear,
      experience: this.experience.recognitionSchedule(fromYear, toYear),
      assumption: this.assumption.recognitionSchedule(fromYear, toYear),
    };
  }

  deferredBalances(): PlanDeferredBalances {
    const experience = this.experience.deferredBalance();
    const assumption = this.assumption.deferredBalance();
    const outflows = experience.outflows + assumption.outflows;
    const inflows = experience.inflows + assumption.inflows;
    return {
      experience,
      assumption,
      total: { outflows, inflows, net: outflows - inflows },
    };
  }

  toSnapshot(): PlanLedgerSnapshot {
    return {
      window: this.window,
      experience: this.experience.toSnapshot().entries,
      assumption: this.assumption.toSnapshot().entries,
    };
  }

  static fromSnapshot(snapshot: PlanLedgerSnapshot): PlanLedgers {
    return new PlanLedgers(
      VintageAmortizationLedger.fromSnapshot({
        kind: 'experience',
        window: snapshot.window,
        entries: snapshot.experience,
      }),
      VintageAmortizationLedger.fromSnapshot({
        kind: 'assumption',
        window: snapshot.window,
        entries: snapshot.assumption,
      }),
    );
  }
}
