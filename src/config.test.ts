import { describe, it, expect } from 'vitest';
import { parseConfig } from './config';
import { ConfigurationError } from './errors';

const required = ['--prior', 'prior.json', '--new-date', '2025-09-30'];

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig(required);

    expect(config).toMatchObject({
      prior: 'prior.json',
      newDate: '2025-09-30',
      benefitPayments: 0,
      trendDuration: 5,
      payrollGrowth: 0.03,
      benefitChanges: 'None',
      window: 7,
      verify: false,
      verbose: false,
      maxExperienceShare: 0.1,
      minDiscountRate: 0.01,
    });
    expect(config.newRate).toBeUndefined();
    expect(config.arsl).toBeUndefined();
    expect(config.ledger).toBeUndefined();
  });

  it('parses numeric flags', () => {
    const config = parseConfig([
      ...required,
      '--new-rate',
      '0.0502',
      '--prior-rate',
      '0.0381',
      '--benefit-payments',
      '1250.50',
      '--actual-eoy-tol',
      '23000',
      '--duration',
      '11.5',
      '--arsl',
      '6',
      '--window',
      '10',
      '--covered-payroll',
      '500000',
      '--verify',
    ]);

    expect(config).toMatchObject({
      newRate: 0.0502,
      priorRate: 0.0381,
      benefitPayments: 1250.5,
      actualEoyTol: 23000,
      duration: 11.5,
      arsl: 6,
      window: 10,
      coveredPayroll: 500000,
      verify: true,
    });
  });

  it('requires the prior snapshot and the new date', () => {
    expect(() => parseConfig(['--new-date', '2025-09-30'])).toThrow('--prior: is required (got undefined)');
    expect(() => parseConfig(['--prior', 'prior.json'])).toThrow(/--new-date/);
  });

  it('rejects a rate given as a percentage', () => {
    expect(() => parseConfig([...required, '--new-rate', '5.02'])).toThrow(ConfigurationError);
    expect(() => parseConfig([...required, '--new-rate', '5.02'])).toThrow(/--new-rate/);
  });

  it('rejects values that are not numbers', () => {
    expect(() => parseConfig([...required, '--benefit-payments', 'lots'])).toThrow(
      '--benefit-payments: must be a number (got "lots")',
    );
  });

  it('rejects a fractional ARSL or window', () => {
    expect(() => parseConfig([...required, '--arsl', '5.5'])).toThrow(/--arsl/);
    expect(() => parseConfig([...required, '--window', '0'])).toThrow(/--window/);
  });

  it('rejects impossible dates', () => {
    expect(() => parseConfig(['--prior', 'prior.json', '--new-date', '2025-02-30'])).toThrow(/--new-date/);
    expect(() => parseConfig([...required, '--prior-date', '2024/09/30'])).toThrow(/--prior-date/);
  });
});
