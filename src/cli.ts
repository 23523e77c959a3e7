#!/usr/bin/env node
/**
 * Command-line entry point for the OPEB roll-forward.
 */

import { parseConfig } from './config';
import { run } from './runner';
import { errorMessage } from './errors';
import { printError } from './output/console-reporter';

function main(): void {
  const config = parseConfig();
  process.exitCode = run(config);
}

try {
  main();
} catch (err) {
  printError(errorMessage(err));
  process.exit(1);
}
