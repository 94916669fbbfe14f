#!/usr/bin/env tsx
/**
 * Print a forensic VIN summary for case documentation
 *
 * Usage: tsx src/forensic-report.ts <VIN> [--json]
 */

import { runCli } from './lib/forensicReport';

process.exitCode = runCli(process.argv.slice(2));
