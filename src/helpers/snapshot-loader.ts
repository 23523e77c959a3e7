/**
 * Loads prior valuation and ledger snapshots from JSON files.
 */

import * as fs from 'fs';
import { ConfigurationError, SnapshotError, errorMessage } from '../errors';
import { DEFAULT_ARSL, createPriorValuation } from '../calculation/prior-valuation';
import { PlanLedgers } from '../ledger/plan-ledgers';
import { isIsoDate } from './dates';
import type { PriorValuation, PriorValuationSnapshot } from '../types/valuation';
import type { AmortizationEntry, PlanLedgerSnapshot } from '../types/ledger';

const REQUIRED_PRIOR_FIELDS = [
  'total_opeb_liability',
  'tol_actives',
  'tol_retirees',
  'service_cost',
  'discount_rate_boy',
  'discount_rate_eoy',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(file: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new SnapshotError(file, `cannot be read: ${errorMessage(err)}`);
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new SnapshotError(file, `is not valid JSON: ${errorMessage(err)}`);
  }
}

function requireNumber(record: Record<string, unknown>, field: string, source: string): number {
  const value = record[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SnapshotError(source, `field "${field}" must be a finite number (got ${JSON.stringify(value)})`);
  }
  return value;
}

/**
 * Check the shape of a parsed prior valuation snapshot.
 */
export function parsePriorValuationSnapshot(data: unknown, source: string): PriorValuationSnapshot {
  if (!isRecord(data)) {
    throw new SnapshotError(source, 'prior valuation must be a JSON object');
  }

  const [total, actives, retirees, serviceCost, rateBoy, rateEoy] = REQUIRED_PRIOR_FIELDS.map(field =>
    requireNumber(data, field, source),
  );
  const snapshot: PriorValuationSnapshot = {
    total_opeb_liability: total,
    tol_actives: actives,
    tol_retirees: retirees,
    service_cost: serviceCost,
    discount_rate_boy: rateBoy,
    discount_rate_eoy: rateEoy,
  };

  if (data.valuation_date !== undefined && data.valuation_date !== null) {
    if (!isIsoDate(data.valuation_date)) {
      throw new SnapshotError(
        source,
        `field "valuation_date" must be a date formatted YYYY-MM-DD (got ${JSON.stringify(data.valuation_date)})`,
      );
    }
    snapshot.valuation_date = data.valuation_date;
  }
  if (data.avg_remaining_service_life !== undefined && data.avg_remaining_service_life !== null) {
    snapshot.avg_remaining_service_life = requireNumber(data, 'avg_remaining_service_life', source);
  }
  if (typeof data.client_name === 'string') {
    snapshot.client_name = data.client_name;
  }

  return snapshot;
}

export interface PriorValuationOverrides {
  /** Used when the snapshot carries no date; must agree when it does. */
  valuationDate?: string;
  /** Must agree with the snapshot's EOY discount rate. */
  discountRateEoy?: number;
}

/**
 * Turn a snapshot into a validated PriorValuation, reconciling it with dates
 * and rates given on the command line.
 */
export function toPriorValuation(
  snapshot: PriorValuationSnapshot,
  overrides: PriorValuationOverrides = {},
): PriorValuation {
  if (
    snapshot.valuation_date !== undefined &&
    overrides.valuationDate !== undefined &&
    snapshot.valuation_date !== overrides.valuationDate
  ) {
    throw new ConfigurationError(
      'prior_date',
      overrides.valuationDate,
      `contradicts the snapshot valuation_date ${snapshot.valuation_date}`,
    );
  }
  if (overrides.discountRateEoy !== undefined && overrides.discountRateEoy !== snapshot.discount_rate_eoy) {
    throw new ConfigurationError(
      'prior_rate',
      overrides.discountRateEoy,
      `contradicts the snapshot discount_rate_eoy ${snapshot.discount_rate_eoy}`,
    );
  }

  const valuationDate = snapshot.valuation_date ?? overrides.valuationDate;
  if (valuationDate === undefined) {
    throw new ConfigurationError('valuation_date', valuationDate, 'is missing from the snapshot; supply the prior measurement date');
  }

  return createPriorValuation({
    valuation_date: valuationDate,
    total_opeb_liability: snapshot.total_opeb_liability,
    tol_actives: snapshot.tol_actives,
    tol_retirees: snapshot.tol_retirees,
    service_cost: snapshot.service_cost,
    discount_rate_boy: snapshot.discount_rate_boy,
    discount_rate_eoy: snapshot.discount_rate_eoy,
    avg_remaining_service_life: snapshot.avg_remaining_service_life ?? DEFAULT_ARSL,
    ...(snapshot.client_name !== undefined ? { client_name: snapshot.client_name } : {}),
  });
}

export function loadPriorValuation(file: string, overrides: PriorValuationOverrides = {}): PriorValuation {
  return toPriorValuation(parsePriorValuationSnapshot(readJson(file), file), overrides);
}

function parseEntries(data: unknown, field: string, source: string): AmortizationEntry[] {
  if (!Array.isArray(data)) {
    throw new SnapshotError(source, `field "${field}" must be an array`);
  }
  return data.map((item: unknown, i) => {
    if (!isRecord(item)) {
      throw new SnapshotError(source, `${field}[${i}] must be an object`);
    }
    return {
      vintage_year: requireNumber(item, 'vintage_year', `${source} ${field}[${i}]`),
      base_amount: requireNumber(item, 'base_amount', `${source} ${field}[${i}]`),
      arsl: requireNumber(item, 'arsl', `${source} ${field}[${i}]`),
    };
  });
}

/**
 * Check the shape of a parsed plan ledger snapshot.
 */
export function parsePlanLedgerSnapshot(data: unknown, source: string): PlanLedgerSnapshot {
  if (!isRecord(data)) {
    throw new SnapshotError(source, 'ledger snapshot must be a JSON object');
  }
  return {
    window: requireNumber(data, 'window', source),
    experience: parseEntries(data.experience, 'experience', source),
    assumption: parseEntries(data.assumption, 'assumption', source),
  };
}

export function loadPlanLedgers(file: string): PlanLedgers {
  return PlanLedgers.fromSnapshot(parsePlanLedgerSnapshot(readJson(file), file));
}
