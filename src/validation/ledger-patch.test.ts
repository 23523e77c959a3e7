import { describe, it, expect } from 'vitest';
import * as path from 'path';
import type { Operation } from 'fast-json-patch';
import { applyLedgerPatch, diffLedgerSnapshots, verifyLedgerPatch } from './ledger-patch';
import { loadPlanLedgers } from '../helpers/snapshot-loader';
import { ConfigurationError, SnapshotError } from '../errors';
import type { PlanLedgerSnapshot } from '../types/ledger';

const FIXTURE = path.join(__dirname, '..', '..', 'fixtures', 'plan-ledger.json');

function advancedPair(): { before: PlanLedgerSnapshot; after: PlanLedgerSnapshot } {
  const ledgers = loadPlanLedgers(FIXTURE);
  const before = ledgers.toSnapshot();
  ledgers.experience.advanceYear(2025, 320, 5);
  ledgers.assumption.advanceYear(2025, -2905.21, 5);
  return { before, after: ledgers.toSnapshot() };
}

describe('diffLedgerSnapshots', () => {
  it('is empty for identical snapshots', () => {
    const { before } = advancedPair();
    expect(diffLedgerSnapshots(before, before)).toEqual([]);
  });

  it('produces a patch that rebuilds the advanced ledger', () => {
    const { before, after } = advancedPair();
    const patch = diffLedgerSnapshots(before, after);

    expect(patch.length).toBeGreaterThan(0);
    expect(applyLedgerPatch(before, patch).toSnapshot()).toEqual(after);
    expect(verifyLedgerPatch(before, patch, after)).toEqual([]);
  });
});

describe('applyLedgerPatch', () => {
  it('leaves the input snapshot untouched', () => {
    const { before, after } = advancedPair();
    const original = structuredClone(before);

    applyLedgerPatch(before, diffLedgerSnapshots(before, after));

    expect(before).toEqual(original);
  });

  it('reports a patch that does not apply', () => {
    const { before } = advancedPair();
    const patch: Operation[] = [{ op: 'test', path: '/window', value: 5 }];

    expect(() => applyLedgerPatch(before, patch)).toThrow(SnapshotError);
    expect(() => applyLedgerPatch(before, patch)).toThrow(/ledger patch: patch failed to apply/);
  });

  it('rejects a patched document with the wrong shape', () => {
    const { before } = advancedPair();
    const patch: Operation[] = [{ op: 'replace', path: '/window', value: 'seven' }];

    expect(() => applyLedgerPatch(before, patch, 'ledger.patch.json')).toThrow(
      'ledger.patch.json: field "window" must be a finite number (got "seven")',
    );
  });

  it('rejects a patched ledger with a gap in its vintages', () => {
    const { before } = advancedPair();
    const patch: Operation[] = [{ op: 'replace', path: '/experience/1/vintage_year', value: 2021 }];

    expect(() => applyLedgerPatch(before, patch)).toThrow(ConfigurationError);
  });
});

describe('verifyLedgerPatch', () => {
  it('lists where the patched ledger differs from the expected one', () => {
    const { before } = advancedPair();

    expect(verifyLedgerPatch(before, [], { ...before, window: 8 })).toEqual([
      'window: expected 8, got 7',
    ]);
  });

  it('returns the failure when the patch cannot be applied', () => {
    const { before } = advancedPair();
    const errors = verifyLedgerPatch(before, [{ op: 'remove', path: '/experience' }], before);

    expect(errors).toEqual(['ledger patch: field "experience" must be an array']);
  });
});
