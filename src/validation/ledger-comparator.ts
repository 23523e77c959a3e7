/**
 * Entry-by-entry comparison of plan ledger snapshots.
 */

import type { AmortizationEntry, LedgerKind, PlanLedgerSnapshot } from '../types/ledger';

/** Base amounts are currency; a cent of drift is not a difference. */
export const BASE_AMOUNT_TOLERANCE = 0.01;

/**
 * Differences between two ledger snapshots. Window, vintage years and ARSL
 * must match exactly; base amounts within the tolerance.
 */
export function compareLedgerSnapshots(
  expected: PlanLedgerSnapshot,
  actual: PlanLedgerSnapshot,
  tolerance: number = BASE_AMOUNT_TOLERANCE,
): string[] {
  const differences: string[] = [];

  if (expected.window !== actual.window) {
    differences.push(`window: expected ${expected.window}, got ${actual.window}`);
  }

  const kinds: LedgerKind[] = ['experience', 'assumption'];
  for (const kind of kinds) {
    differences.push(...compareEntries(kind, expected[kind], actual[kind], tolerance));
  }

  return differences;
}

function compareEntries(
  kind: LedgerKind,
  expected: readonly AmortizationEntry[],
  actual: readonly AmortizationEntry[],
  tolerance: number,
): string[] {
  const differences: string[] = [];

  if (expected.length !== actual.length) {
    differences.push(`${kind}: expected ${expected.length} entries, got ${actual.length}`);
  }

  const count = Math.min(expected.length, actual.length);
  for (let i = 0; i < count; i++) {
    const want = expected[i];
    const got = actual[i];
    const at = `${kind}[${i}]`;

    if (want.vintage_year !== got.vintage_year) {
      differences.push(`${at}.vintage_year: expected ${want.vintage_year}, got ${got.vintage_year}`);
    }
    if (want.arsl !== got.arsl) {
      differences.push(`${at}.arsl: expected ${want.arsl}, got ${got.arsl}`);
    }
    if (!(Math.abs(want.base_amount - got.base_amount) <= tolerance)) {
      differences.push(
        `${at}.base_amount: expected ${want.base_amount}, got ${got.base_amount} (tolerance ${tolerance})`,
      );
    }
  }

  return differences;
}
