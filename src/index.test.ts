import { describe, it, expect } from 'vitest';
import { PlanLedgers, RollForwardEngine, createPriorValuation, verifyRollForward } from './index';

describe('library entry', () => {
  it('rolls forward and advances the ledgers without touching the command line', () => {
    const prior = createPriorValuation({
      valuation_date: '2024-09-30',
      total_opeb_liability: 24010,
      tol_actives: 14406,
      tol_retirees: 9604,
      service_cost: 215,
      discount_rate_boy: 0.0402,
      discount_rate_eoy: 0.0381,
      avg_remaining_service_life: 5,
    });
    const result = new RollForwardEngine().run(prior, {
      current_date: '2025-09-30',
      new_discount_rate: 0.0502,
      duration: 10,
    });
    const ledgers = PlanLedgers.create();
    ledgers.advance(result, 5);

    expect(result.actual_eoy_tol).toBeCloseTo(22238.66675, 6);
    expect(ledgers.latestVintage).toBe(2025);
    expect(verifyRollForward(result, ledgers, { benefitChanges: 'None' }).passed).toBe(true);
  });
});
