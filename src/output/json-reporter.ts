/**
 * JSON output generation.
 * Writes the run report, the advanced ledger and the next prior valuation.
 */

import * as fs from 'fs';
import { errorMessage, SnapshotError } from '../errors';
import type { RunReport } from '../types/results';

/**
 * Write any JSON-serializable value to a file, pretty-printed.
 */
export function writeJsonFile(value: unknown, outputPath: string, label: string): void {
  const json = JSON.stringify(value, null, 2);
  try {
    fs.writeFileSync(outputPath, json + '\n');
  } catch (err) {
    throw new SnapshotError(outputPath, `cannot be written: ${errorMessage(err)}`);
  }
  console.log(`${label} written to ${outputPath}`);
}

export function writeJsonReport(report: RunReport, outputPath: string): void {
  writeJsonFile(report, outputPath, 'Report');
}
