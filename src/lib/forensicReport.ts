/**
 * Forensic report rendering for the command line
 */

import type { ForensicSummary } from './vinTypes';
import { getVinDecoder, type VinDecoder } from './vinDecoder';

const RULE = '═══════════════════════════════════════════════════════════════════════════';
const DIVIDER = '─────────────────────────────────────────────────────────────────────────────';

export const USAGE = 'Usage: forensic-report <VIN> [--json]';

export const EXIT_VALID = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

export function renderReport(summary: ForensicSummary, errors: readonly string[] = []): string[] {
  const lines = [
    RULE,
    '                    VIN FORENSIC SUMMARY',
    RULE,
    '',
    '📋 VEHICLE INFORMATION',
    DIVIDER,
    `   VIN:           ${summary.vin}`,
    `   Manufacturer:  ${summary.manufacturer}`,
    `   Model Year:    ${summary.modelYear || 'N/A'}`,
    `   Vehicle Type:  ${summary.vehicleType || 'N/A'}`,
    `   Status:        ${summary.validationStatus}`,
    '',
    '🔍 FORENSIC NOTES',
    DIVIDER,
    `   WMI Code:      ${summary.forensicNotes.wmiCode || 'N/A'}`,
    `   Plant Code:    ${summary.forensicNotes.plantCode}`,
    `   Serial Number: ${summary.forensicNotes.serialNumber}`,
    '',
  ];

  const relevance = Object.entries(summary.legalRelevance);
  if (relevance.length > 0) {
    lines.push('⚖️  LEGAL RELEVANCE', DIVIDER);
    for (const [key, value] of relevance) {
      lines.push(`   ${key}: ${value}`);
    }
    lines.push('');
  }

  if (errors.length > 0) {
    lines.push('⚠️  ERRORS', DIVIDER);
    errors.forEach((error, idx) => lines.push(`   ${idx + 1}. ${error}`));
    lines.push('');
  }

  lines.push(RULE);
  return lines;
}

/**
 * Run the report for command-line arguments, writing through `print`.
 *
 * @returns Process exit code
 */
export function runForensicReport(
  args: readonly string[],
  decoder: VinDecoder,
  print: (line: string) => void = console.log
): number {
  const json = args.includes('--json');
  const positional = args.filter((arg) => arg !== '--json');

  if (positional.length !== 1) {
    print(USAGE);
    return EXIT_USAGE;
  }

  const [vin] = positional;
  const decoded = decoder.decode(vin);
  const summary = decoder.summarize(decoded);
  const { errors } = decoded;

  if (json) {
    print(JSON.stringify({ ...summary, errors }, null, 2));
  } else {
    renderReport(summary, errors).forEach((line) => print(line));
  }

  return summary.validationStatus === 'VALID' ? EXIT_VALID : EXIT_INVALID;
}

/**
 * Command-line entry. The decoder (and with it the process logger) is
 * resolved inside the try block; config errors exit 1 with a message.
 *
 * @returns Process exit code
 */
export function runCli(
  args: readonly string[],
  resolveDecoder: () => VinDecoder = getVinDecoder,
  print: (line: string) => void = console.log,
  printError: (line: string) => void = console.error
): number {
  try {
    return runForensicReport(args, resolveDecoder(), print);
  } catch (error) {
    printError(
      `[Forensic Report] Error generating report: ${error instanceof Error ? error.message : String(error)}`
    );
    return EXIT_INVALID;
  }
}
