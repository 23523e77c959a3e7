import { describe, it, expect } from 'vitest';
import {
  activeFraction,
  assumptionChangeEffect,
  durationEstimate,
  interestCost,
} from './actuarial-math';
import { ConfigurationError } from '../errors';

describe('interestCost', () => {
  it('applies the rate to the mid-year balance', () => {
    expect(interestCost(24010, 215, 0, 0.0381)).toBeCloseTo(918.87675, 8);
  });

  it('takes half of benefit payments off the balance', () => {
    expect(interestCost(1000, 100, 200, 0.05)).toBeCloseTo(47.5, 10);
  });

  it('allows payments larger than service cost', () => {
    expect(interestCost(1000, 0, 4000, 0.04)).toBeCloseTo(-40, 10);
  });

  it('rejects rates outside (0, 1)', () => {
    expect(() => interestCost(1000, 0, 0, 0)).toThrow(ConfigurationError);
    expect(() => interestCost(1000, 0, 0, 1)).toThrow(ConfigurationError);
    expect(() => interestCost(1000, 0, 0, 3.81)).toThrow(/discount_rate/);
  });

  it('rejects a negative beginning liability', () => {
    expect(() => interestCost(-1, 0, 0, 0.04)).toThrow(/boy_tol/);
  });
});

describe('assumptionChangeEffect', () => {
  it('reduces the liability when the rate rises', () => {
    expect(assumptionChangeEffect(24010, 10, 0.0121)).toBeCloseTo(-2905.21, 6);
  });

  it('increases the liability when the rate falls', () => {
    expect(assumptionChangeEffect(24010, 10, -0.01)).toBeCloseTo(2401, 8);
  });

  it('rejects a negative duration', () => {
    expect(() => assumptionChangeEffect(24010, -1, 0.01)).toThrow(/duration/);
  });
});

describe('durationEstimate', () => {
  it('blends active and retiree durations', () => {
    expect(durationEstimate(0.6, 5)).toBeCloseTo(13, 10);
    expect(durationEstimate(0, 5)).toBe(10);
    expect(durationEstimate(1, 5)).toBe(15);
  });

  it('rejects an active fraction outside [0, 1]', () => {
    expect(() => durationEstimate(1.2, 5)).toThrow(ConfigurationError);
    expect(() => durationEstimate(-0.1, 5)).toThrow(ConfigurationError);
    expect(() => durationEstimate(Number.NaN, 5)).toThrow(/active_fraction/);
  });
});

describe('activeFraction', () => {
  it('divides actives by the total', () => {
    expect(activeFraction(14406, 24010)).toBeCloseTo(0.6, 12);
  });

  it('raises instead of dividing by a zero total', () => {
    try {
      activeFraction(0, 0);
      expect.unreachable('expected a configuration error');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ field: 'total_opeb_liability', value: 0 });
    }
  });
});
