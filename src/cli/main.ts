#!/usr/bin/env node
/**
 * doctags CLI binary entry point.
 */

import { run } from './index';
import { createCliLogger } from '../shared/logger';

function main(): void {
  const exitCode = run(process.argv, console.log, { logger: createCliLogger() });
  process.exitCode = exitCode;
}

try {
  main();
} catch (err) {
  console.error('Fatal error:', err);
  process.exitCode = 2;
}
