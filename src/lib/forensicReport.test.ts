/**
 * Unit Tests for the forensic report command
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigError } from './config';
import {
  EXIT_INVALID,
  EXIT_USAGE,
  EXIT_VALID,
  USAGE,
  runCli,
  runForensicReport,
} from './forensicReport';
import { createLogger } from './logger';
import { VinDecoder } from './vinDecoder';

const PALISADE_VIN = 'KM8R54HE1LU066808';

describe('runForensicReport()', () => {
  let decoder: VinDecoder;
  let output: string[];
  const print = (line: string) => {
    output.push(line);
  };

  beforeEach(() => {
    decoder = new VinDecoder({
      logger: createLogger({ scope: 'Test', level: 'silent', format: 'text' }),
    });
    output = [];
  });

  it('should print a text report for a valid VIN', () => {
    const code = runForensicReport([PALISADE_VIN], decoder, print);

    expect(code).toBe(EXIT_VALID);
    expect(output).toContain(`   VIN:           ${PALISADE_VIN}`);
    expect(output).toContain('   Manufacturer:  Hyundai Motor Company');
    expect(output).toContain('   Model Year:    2020');
    expect(output).toContain('   Status:        VALID');
    expect(output).toContain('   Serial Number: 066808');
    expect(output).toContain('   warrantyStatus: 10-year powertrain warranty applicable');
    expect(output).not.toContain('⚠️  ERRORS');
  });

  it('should list errors and exit 1 for an invalid VIN', () => {
    const code = runForensicReport(['KM8R54HE1L'], decoder, print);

    expect(code).toBe(EXIT_INVALID);
    expect(output).toContain('   Status:        INVALID');
    expect(output).toContain('   Model Year:    N/A');
    expect(output).toContain('   1. VIN must be 17 characters, got 10');
    expect(output).not.toContain('⚖️  LEGAL RELEVANCE');
  });

  it('should print JSON including errors', () => {
    const code = runForensicReport(['--json', 'WBA3B5C51KA123456'], decoder, print);

    expect(code).toBe(EXIT_VALID);
    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0])).toEqual({
      vin: 'WBA3B5C51KA123456',
      manufacturer: 'BMW',
      modelYear: 0,
      vehicleType: 'Unknown Vehicle Type',
      validationStatus: 'VALID',
      forensicNotes: { wmiCode: 'WBA', plantCode: 'A', serialNumber: '123456' },
      legalRelevance: {},
      errors: ['Unknown model year code: K'],
    });
  });

  it('should print usage without exactly one VIN', () => {
    expect(runForensicReport([], decoder, print)).toBe(EXIT_USAGE);
    expect(runForensicReport(['A', 'B'], decoder, print)).toBe(EXIT_USAGE);
    expect(output).toEqual([USAGE, USAGE]);
  });
});

describe('runCli()', () => {
  it('should report a config error and exit 1', () => {
    const output: string[] = [];
    const errors: string[] = [];

    const code = runCli(
      [PALISADE_VIN],
      () => {
        throw new ConfigError('LOG_LEVEL', 'verbose');
      },
      (line) => output.push(line),
      (line) => errors.push(line)
    );

    expect(code).toBe(EXIT_INVALID);
    expect(output).toEqual([]);
    expect(errors).toEqual([
      '[Forensic Report] Error generating report: Invalid value for LOG_LEVEL: "verbose"',
    ]);
  });

  it('should run the report with the resolved decoder', () => {
    const output: string[] = [];
    const decoder = new VinDecoder({
      logger: createLogger({ scope: 'Test', level: 'silent', format: 'text' }),
    });

    const code = runCli(['--json', PALISADE_VIN], () => decoder, (line) => output.push(line));

    expect(code).toBe(EXIT_VALID);
    expect(JSON.parse(output[0])).toMatchObject({ vin: PALISADE_VIN, validationStatus: 'VALID' });
  });
});
