/**
 * JSON Patch (RFC 6902) between ledger snapshots, for adapters that persist
 * ledger changes incrementally.
 */

import { applyPatch, compare, deepClone, type Operation } from 'fast-json-patch';
import { SnapshotError, errorMessage } from '../errors';
import { PlanLedgers } from '../ledger/plan-ledgers';
import { parsePlanLedgerSnapshot } from '../helpers/snapshot-loader';
import { compareLedgerSnapshots } from './ledger-comparator';
import type { PlanLedgerSnapshot } from '../types/ledger';

/**
 * Operations that turn `before` into `after`.
 */
export function diffLedgerSnapshots(before: PlanLedgerSnapshot, after: PlanLedgerSnapshot): Operation[] {
  return compare(before, after);
}

/**
 * Apply a patch to a copy of the snapshot and re-validate the result as a
 * plan ledger. The input snapshot is left untouched.
 */
export function applyLedgerPatch(
  snapshot: PlanLedgerSnapshot,
  operations: readonly Operation[],
  source: string = 'ledger patch',
): PlanLedgers {
  const copy: PlanLedgerSnapshot = deepClone(snapshot);

  let patched: unknown;
  try {
    patched = applyPatch(copy, operations, true, true).newDocument;
  } catch (err) {
    throw new SnapshotError(source, `patch failed to apply: ${errorMessage(err)}`);
  }

  return PlanLedgers.fromSnapshot(parsePlanLedgerSnapshot(patched, source));
}

/**
 * Differences between the ledger a patch produces and the ledger expected.
 */
export function verifyLedgerPatch(
  before: PlanLedgerSnapshot,
  operations: readonly Operation[],
  expected: PlanLedgerSnapshot,
): string[] {
  let result: PlanLedgerSnapshot;
  try {
    result = applyLedgerPatch(before, operations).toSnapshot();
  } catch (err) {
    return [errorMessage(err)];
  }
  return compareLedgerSnapshots(expected, result);
}
