/**
 * CLI argument parsing and configuration.
 */

import { Command } from 'commander';
import { ConfigurationError } from './errors';
import { parseIsoDate } from './helpers/dates';
import { DEFAULT_WINDOW } from './ledger/vintage-ledger';
import { DEFAULT_PAYROLL_GROWTH, DEFAULT_TREND_DURATION } from './calculation/disclosures';
import { DEFAULT_ANOMALY_THRESHOLDS } from './validation/anomaly-detector';

export interface Config {
  prior: string;
  priorDate?: string;
  priorRate?: number;
  newDate: string;
  newRate?: number;
  benefitPayments: number;
  actualEoyTol?: number;
  serviceCost?: number;
  duration?: number;
  trendDuration: number;
  payrollGrowth: number;
  coveredPayroll?: number;
  benefitChanges: string;
  arsl?: number;
  ledger?: string;
  window: number;
  output?: string;
  ledgerOutput?: string;
  nextPrior?: string;
  verify: boolean;
  verbose: boolean;
  maxExperienceShare: number;
  minDiscountRate: number;
}

type CliOptions = {
  prior?: string;
  priorDate?: string;
  priorRate?: string;
  newDate?: string;
  newRate?: string;
  benefitPayments: string;
  actualEoyTol?: string;
  serviceCost?: string;
  duration?: string;
  trendDuration: string;
  payrollGrowth: string;
  coveredPayroll?: string;
  benefitChanges: string;
  arsl?: string;
  ledger?: string;
  window: string;
  output?: string;
  ledgerOutput?: string;
  nextPrior?: string;
  verify: boolean;
  verbose: boolean;
  maxExperienceShare: string;
  minDiscountRate: string;
};

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigurationError(flag, raw, 'must be a number');
  }
  return value;
}

function parseOptionalNumber(flag: string, raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : parseNumber(flag, raw);
}

function parseRate(flag: string, raw: string | undefined): number | undefined {
  const rate = parseOptionalNumber(flag, raw);
  if (rate !== undefined && !(rate > 0 && rate < 1)) {
    throw new ConfigurationError(flag, raw, 'must be a fraction between 0 and 1 (e.g. 0.0381)');
  }
  return rate;
}

function parsePositiveInteger(flag: string, raw: string): number {
  const value = parseNumber(flag, raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(flag, raw, 'must be a positive integer');
  }
  return value;
}

function parseNonNegative(flag: string, raw: string): number {
  const value = parseNumber(flag, raw);
  if (value < 0) {
    throw new ConfigurationError(flag, raw, 'must not be negative');
  }
  return value;
}

export function parseConfig(argv?: string[]): Config {
  const program = new Command();

  program
    .name('opeb-rollforward')
    .description('Roll a GASB 75 Total OPEB Liability forward one measurement period')
    .option('--prior <file>', 'Prior valuation snapshot (JSON)')
    .option('--prior-date <date>', 'Prior measurement date, YYYY-MM-DD (required when the snapshot has none)')
    .option('--prior-rate <rate>', 'Prior EOY discount rate (e.g., 0.0381); must match the snapshot')
    .option('--new-date <date>', 'New measurement date, YYYY-MM-DD')
    .option('--new-rate <rate>', 'New discount rate (e.g., 0.0502); defaults to the prior EOY rate')
    .option('--benefit-payments <amount>', 'Benefit payments made during the period', '0')
    .option('--actual-eoy-tol <amount>', 'Actual EOY TOL from a full valuation')
    .option('--service-cost <amount>', 'Service cost from a full valuation')
    .option('--duration <years>', 'Liability duration (default: blended estimate from the prior valuation)')
    .option('--trend-duration <years>', 'Healthcare trend duration for sensitivities', String(DEFAULT_TREND_DURATION))
    .option('--payroll-growth <rate>', 'Covered payroll growth rate', String(DEFAULT_PAYROLL_GROWTH))
    .option('--covered-payroll <amount>', 'Prior covered payroll')
    .option('--benefit-changes <text>', 'Benefit changes description', 'None')
    .option('--arsl <years>', 'ARSL assigned to this period\'s amortization bases (default: prior ARSL, rounded)')
    .option('--ledger <file>', 'Amortization ledger snapshot to advance (JSON)')
    .option('--window <years>', 'Window for a new ledger', String(DEFAULT_WINDOW))
    .option('--output <file>', 'Write the run report (JSON)')
    .option('--ledger-output <file>', 'Write the advanced ledger snapshot (JSON)')
    .option('--next-prior <file>', 'Write the next period\'s prior valuation snapshot (JSON)')
    .option('--verify', 'Run verification checks; failures exit with status 1', false)
    .option('--verbose', 'Show ledger detail and the ledger patch', false)
    .option(
      '--max-experience-share <fraction>',
      'Warn when experience exceeds this share of BOY TOL',
      String(DEFAULT_ANOMALY_THRESHOLDS.maxExperienceShare),
    )
    .option(
      '--min-discount-rate <rate>',
      'Warn when the new discount rate is below this',
      String(DEFAULT_ANOMALY_THRESHOLDS.minDiscountRate),
    );

  if (argv) {
    program.parse(argv, { from: 'user' });
  } else {
    program.parse();
  }

  const opts = program.opts<CliOptions>();

  if (!opts.prior) {
    throw new ConfigurationError('--prior', opts.prior, 'is required');
  }
  if (!opts.newDate) {
    throw new ConfigurationError('--new-date', opts.newDate, 'is required');
  }
  parseIsoDate('--new-date', opts.newDate);
  if (opts.priorDate !== undefined) {
    parseIsoDate('--prior-date', opts.priorDate);
  }

  const duration = parseOptionalNumber('--duration', opts.duration);
  if (duration !== undefined && duration < 0) {
    throw new ConfigurationError('--duration', opts.duration, 'must not be negative');
  }

  const payrollGrowth = parseNumber('--payroll-growth', opts.payrollGrowth);
  if (payrollGrowth <= -1) {
    throw new ConfigurationError('--payroll-growth', opts.payrollGrowth, 'must be greater than -1');
  }

  const coveredPayroll = parseOptionalNumber('--covered-payroll', opts.coveredPayroll);
  if (coveredPayroll !== undefined && coveredPayroll < 0) {
    throw new ConfigurationError('--covered-payroll', opts.coveredPayroll, 'must not be negative');
  }

  return {
    prior: opts.prior,
    priorDate: opts.priorDate,
    priorRate: parseRate('--prior-rate', opts.priorRate),
    newDate: opts.newDate,
    newRate: parseRate('--new-rate', opts.newRate),
    benefitPayments: parseNumber('--benefit-payments', opts.benefitPayments),
    actualEoyTol: parseOptionalNumber('--actual-eoy-tol', opts.actualEoyTol),
    serviceCost: parseOptionalNumber('--service-cost', opts.serviceCost),
    duration,
    trendDuration: parseNonNegative('--trend-duration', opts.trendDuration),
    payrollGrowth,
    coveredPayroll,
    benefitChanges: opts.benefitChanges,
    arsl: opts.arsl === undefined ? undefined : parsePositiveInteger('--arsl', opts.arsl),
    ledger: opts.ledger,
    window: parsePositiveInteger('--window', opts.window),
    output: opts.output,
    ledgerOutput: opts.ledgerOutput,
    nextPrior: opts.nextPrior,
    verify: opts.verify,
    verbose: opts.verbose,
    maxExperienceShare: parseNonNegative('--max-experience-share', opts.maxExperienceShare),
    minDiscountRate: parseNonNegative('--min-discount-rate', opts.minDiscountRate),
  };
}
