/**
 * Console output formatting.
 * Displays the reconciliation, disclosures and ledgers in a readable layout.
 */

import type { Operation } from 'fast-json-patch';
import type { VintageAmortizationLedger } from '../ledger/vintage-ledger';
import type { PlanRecognitionSchedule } from '../ledger/plan-ledgers';
import type { VerificationReport } from '../validation/reconciliation-verifier';
import type { Anomaly } from '../types/valuation';
import type { RunReport } from '../types/results';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const RESET = '\x1b[0m';

const RULE = '='.repeat(60);

/**
 * Whole-dollar amount, right-aligned for the summary columns.
 */
export function formatAmount(value: number): string {
  const rounded = Math.round(value);
  const digits = Math.abs(rounded).toLocaleString('en-US');
  const text = rounded < 0 ? `-$${digits}` : `$${digits}`;
  return text.padStart(13);
}

export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

function line(label: string, value: number): void {
  console.log(`  ${label.padEnd(24)}${formatAmount(value)}`);
}

export function printWarnings(warnings: readonly Anomaly[]): void {
  for (const w of warnings) {
    console.log(`${YELLOW}  ⚠ ${w.code}: ${w.message}${RESET}`);
  }
}

/**
 * Print the TOL reconciliation and disclosure figures.
 */
export function printRollForwardSummary(report: RunReport): void {
  const { result, disclosures, recognition } = report;

  console.log(RULE);
  console.log('GASB 75 ROLL-FORWARD SUMMARY');
  console.log(RULE);
  if (report.client_name) {
    console.log(`Plan: ${report.client_name}`);
  }
  console.log(`Measurement Period: ${result.boy_date} → ${result.eoy_date} (${result.valuation_type})`);
  console.log(`Discount Rate: ${formatRate(result.prior_discount_rate)} → ${formatRate(result.new_discount_rate)}`);
  console.log(`Duration: ${result.duration.toFixed(2)}`);
  console.log('');
  console.log('TOL Reconciliation:');
  line('Beginning TOL:', result.boy_tol);
  line('Service Cost:', result.service_cost);
  line('Interest Cost:', result.interest_cost);
  line('Benefit Payments:', -result.benefit_payments);
  line('Expected EOY TOL:', result.expected_eoy_tol);
  line('Assumption Changes:', result.assumption_change_effect);
  line('Experience (Gain)/Loss:', result.experience_gain_loss);
  line('Ending TOL:', result.actual_eoy_tol);
  line('BOY TOL (new rate):', disclosures.boy_tol_new_rate);
  console.log('');
  console.log('Sensitivities:');
  line('Discount +1%:', disclosures.sensitivity_discount_plus_1);
  line('Discount -1%:', disclosures.sensitivity_discount_minus_1);
  line('Trend +1%:', disclosures.sensitivity_trend_plus_1);
  line('Trend -1%:', disclosures.sensitivity_trend_minus_1);
  if (disclosures.covered_payroll !== null) {
    console.log('');
    line('Covered Payroll:', disclosures.covered_payroll);
    if (disclosures.tol_percent_of_covered_payroll !== null) {
      console.log(`  ${'TOL % of Payroll:'.padEnd(24)}${formatRate(disclosures.tol_percent_of_covered_payroll).padStart(13)}`);
    }
  }
  console.log('');
  console.log(`Benefit Changes: ${report.benefit_changes}`);
  console.log('');
  console.log('Amortization Recognized This Period:');
  line('Experience:', recognition.experience);
  line('Assumptions:', recognition.assumption);
  line('Total:', recognition.total);

  for (const [kind, evicted] of Object.entries(report.evicted)) {
    if (evicted) {
      console.log(`  Vintage ${evicted.vintage_year} left the ${kind} window (base ${formatAmount(evicted.base_amount).trim()})`);
    }
  }

  if (result.warnings.length > 0) {
    console.log('');
    console.log('Warnings:');
    printWarnings(result.warnings);
  }
  console.log(RULE);
}

/**
 * Print a ledger's entries with elapsed periods and this period's slice.
 */
export function printLedger(ledger: VintageAmortizationLedger): void {
  console.log(`\n--- ${ledger.kind} ledger (window ${ledger.window}) ---`);
  console.log(`  ${'Vintage'.padEnd(9)}${'Base'.padStart(13)}${'ARSL'.padStart(6)}${'Elapsed'.padStart(9)}${'Recognized'.padStart(13)}`);
  const latest = ledger.latestVintage;
  for (const entry of ledger.entries()) {
    const recognized = latest === null ? 0 : ledger.recognitionIn(entry, latest);
    console.log(
      `  ${String(entry.vintage_year).padEnd(9)}${formatAmount(entry.base_amount)}` +
      `${String(entry.arsl).padStart(6)}${String(ledger.elapsedPeriods(entry)).padStart(9)}${formatAmount(recognized)}`,
    );
  }
}

/**
 * Print each vintage's recognition by year, experience then assumptions.
 */
export function printRecognitionSchedule(schedule: PlanRecognitionSchedule): void {
  console.log(`\n--- Recognition schedule ${schedule.from_year}-${schedule.to_year} ---`);
  const years: number[] = [];
  for (let year = schedule.from_year; year <= schedule.to_year; year++) {
    years.push(year);
  }
  for (const kind of ['experience', 'assumption'] as const) {
    console.log(`  ${kind}`);
    console.log(`  ${'Vintage'.padEnd(9)}${years.map(y => String(y).padStart(13)).join('')}`);
    for (const row of schedule[kind]) {
      console.log(`  ${String(row.vintage_year).padEnd(9)}${years.map(y => formatAmount(row.amounts[y])).join('')}`);
    }
  }
}

export function printLedgerPatch(operations: readonly Operation[]): void {
  console.log(`\n--- Ledger patch (${operations.length} operations) ---`);
  for (const op of operations) {
    const value = 'value' in op ? ` ${JSON.stringify(op.value)}` : '';
    console.log(`  ${op.op.padEnd(8)}${op.path}${value}`);
  }
}

export function printVerification(verification: VerificationReport): void {
  console.log('\n--- Verification ---');
  for (const [name, check] of Object.entries(verification.checks)) {
    const status = check.passed ? `${GREEN}PASS${RESET}` : `${RED}FAIL${RESET}`;
    console.log(`  [${status}]  ${name.padEnd(40)} ${JSON.stringify(check.actual)}`);
    if (!check.passed) {
      console.log(`    ${YELLOW}→ expected ${JSON.stringify(check.expected)}${RESET}`);
    }
  }
  if (verification.passed) {
    console.log(`${GREEN}All verification checks passed.${RESET}`);
  } else {
    console.log(`${RED}Some verification checks failed - review the output.${RESET}`);
  }
}

export function printError(message: string): void {
  console.error(`${RED}Error: ${message}${RESET}`);
}
