import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  loadPlanLedgers,
  loadPriorValuation,
  parsePlanLedgerSnapshot,
  parsePriorValuationSnapshot,
  toPriorValuation,
} from './snapshot-loader';
import { ConfigurationError, SnapshotError } from '../errors';

const FIXTURES = path.join(__dirname, '..', '..', 'fixtures');

describe('loadPriorValuation', () => {
  it('loads a dated snapshot', () => {
    const prior = loadPriorValuation(path.join(FIXTURES, 'prior-valuation.json'));

    expect(prior).toMatchObject({
      client_name: 'Sample County OPEB Plan',
      valuation_date: '2024-09-30',
      total_opeb_liability: 24010,
      discount_rate_eoy: 0.0381,
      avg_remaining_service_life: 5,
    });
  });

  it('accepts matching command-line values', () => {
    const prior = loadPriorValuation(path.join(FIXTURES, 'prior-valuation.json'), {
      valuationDate: '2024-09-30',
      discountRateEoy: 0.0381,
    });
    expect(prior.valuation_date).toBe('2024-09-30');
  });

  it('takes the date from the command line when the snapshot has none', () => {
    const prior = loadPriorValuation(path.join(FIXTURES, 'prior-valuation-undated.json'), {
      valuationDate: '2024-06-30',
    });

    expect(prior.valuation_date).toBe('2024-06-30');
    expect(prior.avg_remaining_service_life).toBe(12);
    expect(prior.client_name).toBeUndefined();
  });

  it('requires a date from somewhere', () => {
    expect(() => loadPriorValuation(path.join(FIXTURES, 'prior-valuation-undated.json'))).toThrow(
      /valuation_date/,
    );
  });

  it('rejects a command-line date or rate that contradicts the snapshot', () => {
    const file = path.join(FIXTURES, 'prior-valuation.json');
    expect(() => loadPriorValuation(file, { valuationDate: '2024-06-30' })).toThrow(/prior_date/);
    expect(() => loadPriorValuation(file, { discountRateEoy: 0.04 })).toThrow(/prior_rate/);
  });
});

describe('parsePriorValuationSnapshot', () => {
  const valid = {
    total_opeb_liability: 100,
    tol_actives: 60,
    tol_retirees: 40,
    service_cost: 5,
    discount_rate_boy: 0.04,
    discount_rate_eoy: 0.04,
  };

  it('names the field that is not a number', () => {
    expect(() => parsePriorValuationSnapshot({ ...valid, service_cost: '5' }, 'prior.json')).toThrow(
      'prior.json: field "service_cost" must be a finite number (got "5")',
    );
  });

  it('rejects a malformed date', () => {
    expect(() => parsePriorValuationSnapshot({ ...valid, valuation_date: '30/09/2024' }, 'prior.json')).toThrow(
      SnapshotError,
    );
  });

  it('rejects anything but an object', () => {
    expect(() => parsePriorValuationSnapshot([valid], 'prior.json')).toThrow(/must be a JSON object/);
  });

  it('leaves split validation to the valuation', () => {
    const snapshot = parsePriorValuationSnapshot({ ...valid, tol_retirees: 10 }, 'prior.json');
    expect(() => toPriorValuation(snapshot, { valuationDate: '2024-09-30' })).toThrow(ConfigurationError);
  });
});

describe('plan ledger snapshots', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'opeb-ledger-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the fixture ledger', () => {
    const ledgers = loadPlanLedgers(path.join(FIXTURES, 'plan-ledger.json'));

    expect(ledgers.window).toBe(7);
    expect(ledgers.latestVintage).toBe(2024);
    expect(ledgers.experience.oldestVintage).toBe(2018);
  });

  it('reports a missing file', () => {
    const file = path.join(dir, 'missing.json');
    expect(() => loadPlanLedgers(file)).toThrow(SnapshotError);
    expect(() => loadPlanLedgers(file)).toThrow(/cannot be read/);
  });

  it('reports invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "window": 7,');
    expect(() => loadPlanLedgers(file)).toThrow(/is not valid JSON/);
  });

  it('names the entry with a bad field', () => {
    expect(() =>
      parsePlanLedgerSnapshot(
        { window: 7, experience: [{ vintage_year: 2024, base_amount: 'x', arsl: 5 }], assumption: [] },
        'ledger.json',
      ),
    ).toThrow('ledger.json experience[0]: field "base_amount" must be a finite number (got "x")');
  });

  it('rejects entries that are not objects', () => {
    expect(() => parsePlanLedgerSnapshot({ window: 7, experience: [42], assumption: [] }, 'ledger.json')).toThrow(
      'ledger.json: experience[0] must be an object',
    );
  });
});
