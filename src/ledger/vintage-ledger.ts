/**
 * Rolling window of deferred amortization bases keyed by vintage year.
 *
 * Each entry's ARSL belongs to its vintage and is frozen when the entry is
 * created. Advancing a year moves every entry one period further from its
 * origin; it never rewrites an ARSL. Recognition ends when an entry's elapsed
 * periods reach its ARSL, while eviction happens only when the entry falls out
 * of the reporting window. The two thresholds are independent.
 */

import { ConfigurationError, InvariantViolationError } from '../errors';
import type {
  AmortizationEntry,
  DeferredBalance,
  LedgerKind,
  LedgerSnapshot,
  RecognitionRow,
} from '../types/ledger';

/** Years a deferred amount stays visible in the supplementary schedules. */
export const DEFAULT_WINDOW = 7;

const LEDGER_KINDS: readonly LedgerKind[] = ['experience', 'assumption'];

function requireWindow(window: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new ConfigurationError('window', window, 'must be a positive integer');
  }
}

export class VintageAmortizationLedger {
  /** Most recent vintage first. */
  private items: readonly AmortizationEntry[] = [];

  constructor(
    readonly kind: LedgerKind,
    readonly window: number = DEFAULT_WINDOW,
  ) {
    if (!LEDGER_KINDS.includes(kind)) {
      throw new ConfigurationError('kind', kind, `must be one of: ${LEDGER_KINDS.join(', ')}`);
    }
    requireWindow(window);
  }

  get size(): number {
    return this.items.length;
  }

  get latestVintage(): number | null {
    return this.items.length > 0 ? this.items[0].vintage_year : null;
  }

  get oldestVintage(): number | null {
    return this.items.length > 0 ? this.items[this.items.length - 1].vintage_year : null;
  }

  entries(): readonly AmortizationEntry[] {
    return this.items;
  }

  entryFor(vintageYear: number): AmortizationEntry | undefined {
    return this.items.find(e => e.vintage_year === vintageYear);
  }

  /**
   * Periods since the entry originated, measured at the latest vintage.
   */
  elapsedPeriods(entry: AmortizationEntry): number {
    const latest = this.latestVintage;
    return latest === null ? 0 : latest - entry.vintage_year;
  }

  /**
   * Throws the error advanceYear would raise, without mutating.
   */
  validateAdvance(vintageYear: number, baseAmount: number, newArsl: number): void {
    if (!Number.isInteger(vintageYear)) {
      throw new ConfigurationError('vintage_year', vintageYear, 'must be an integer year');
    }
    const latest = this.latestVintage;
    if (latest !== null && vintageYear !== latest + 1) {
      throw new ConfigurationError(
        'vintage_year',
        vintageYear,
        `${this.kind} ledger expects vintage ${latest + 1} after ${latest}`,
      );
    }
    if (!Number.isFinite(baseAmount)) {
      throw new ConfigurationError('base_amount', baseAmount, 'must be a finite number');
    }
    if (!Number.isInteger(newArsl) || newArsl < 1) {
      throw new ConfigurationError('arsl', newArsl, 'must be a positive integer number of years');
    }
  }

  /**
   * Insert the newest vintage. Returns the entry evicted from the window,
   * or null when the window still has room.
   */
  advanceYear(vintageYear: number, baseAmount: number, newArsl: number): AmortizationEntry | null {
    this.validateAdvance(vintageYear, baseAmount, newArsl);

    const entry: AmortizationEntry = Object.freeze({
      vintage_year: vintageYear,
      base_amount: baseAmount,
      arsl: newArsl,
    });
    const next = [entry, ...this.items];
    const evicted = next.length > this.window ? next.pop() ?? null : null;

    if (next.length > this.window) {
      throw new InvariantViolationError(
        'ledger window',
        `${this.kind} ledger holds ${next.length} entries after eviction (window ${this.window})`,
      );
    }

    this.items = Object.freeze(next);
    return evicted;
  }

  /**
   * Straight-line slice of one entry recognized in the given year.
   */
  recognitionIn(entry: AmortizationEntry, year: number): number {
    const elapsed = year - entry.vintage_year;
    return elapsed >= 0 && elapsed < entry.arsl ? entry.base_amount / entry.arsl : 0;
  }

  recognizedAmountThisPeriod(): number {
    const latest = this.latestVintage;
    if (latest === null) return 0;
    return this.items.reduce((sum, e) => sum + this.recognitionIn(e, latest), 0);
  }

  /**
   * Recognition of every vintage in each year of [fromYear, toYear].
   */
  recognitionSchedule(fromYear: number, toYear: number): RecognitionRow[] {
    if (!Number.isInteger(fromYear) || !Number.isInteger(toYear) || toYear < fromYear) {
      throw new ConfigurationError('toYear', toYear, `must be an integer year not before ${fromYear}`);
    }

    return this.items.map(entry => {
      const amounts: Record<number, number> = {};
      for (let year = fromYear; year <= toYear; year++) {
        amounts[year] = this.recognitionIn(entry, year);
      }
      return {
        vintage_year: entry.vintage_year,
        base_amount: entry.base_amount,
        arsl: entry.arsl,
        amounts,
      };
    });
  }

  /**
   * Unrecognized remainder of every entry after the latest period's
   * recognition. Losses defer as outflows, gains as inflows.
   */
  deferredBalance(): DeferredBalance {
    let outflows = 0;
    let inflows = 0;

    for (const entry of this.items) {
      const periodsRecognized = Math.min(this.elapsedPeriods(entry) + 1, entry.arsl);
      const remaining = entry.base_amount - (entry.base_amount / entry.arsl) * periodsRecognized;
      if (remaining > 0) {
        outflows += remaining;
      } else if (remaining < 0) {
        inflows -= remaining;
      }
    }

    return { outflows, inflows, net: outflows - inflows };
  }

  toSnapshot(): LedgerSnapshot {
    return {
      kind: this.kind,
      window: this.window,
      entries: this.items.map(e => ({ ...e })),
    };
  }

  /**
   * Rebuild a ledger from a persisted snapshot by replaying its entries
   * oldest first.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): VintageAmortizationLedger {
    const ledger = new VintageAmortizationLedger(snapshot.kind, snapshot.window);
    const { entries } = snapshot;

    if (entries.length > snapshot.window) {
      throw new ConfigurationError(
        `${snapshot.kind}.entries`,
        entries.length,
        `holds more entries than the window of ${snapshot.window}`,
      );
    }

    for (let i = 1; i < entries.length; i++) {
      if (entries[i].vintage_year !== entries[i - 1].vintage_year - 1) {
        throw new ConfigurationError(
          `${snapshot.kind}.entries[${i}].vintage_year`,
          entries[i].vintage_year,
          `must be ${entries[i - 1].vintage_year - 1} (entries run most recent first without gaps)`,
        );
      }
    }

    for (let i = entries.length - 1; i >= 0; i--) {
      const e = entries[i];
      ledger.advanceYear(e.vintage_year, e.base_amount, e.arsl);
    }

    return ledger;
  }
}
