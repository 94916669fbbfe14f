/**
 * VIN Decoder
 *
 * Validates a VIN and breaks it into human-readable fields using the static
 * lookup tables, plus a forensic view for legal documentation. Malformed
 * input never throws: problems come back in the record's errors list with
 * placeholder field values.
 */

import { getLogger, type Logger } from './logger';
import {
  DEFAULT_VEHICLE_TYPE,
  LEGAL_RELEVANCE_RULES,
  MANUFACTURERS,
  MODEL_YEARS,
  VEHICLE_TYPE_SIGNATURES,
} from './vinTables';
import type {
  DecodedVIN,
  ForensicSummary,
  LegalRelevance,
  LegalRelevanceRule,
  ValidationResult,
  VehicleTypeSignature,
} from './vinTypes';
import { VIN_ERRORS, normalizeVIN, validateVIN } from './vinValidator';

export class VinInputError extends Error {
  constructor(public received: string) {
    super(`VIN must be a string, got ${received}`);
    this.name = 'VinInputError';
  }
}

export interface VinDecoderOptions {
  logger?: Logger;
  vehicleTypes?: readonly VehicleTypeSignature[];
  legalRelevanceRules?: readonly LegalRelevanceRule[];
}

const UNKNOWN = 'Unknown';
const CASE_ID_SUFFIX_LENGTH = 6;

// Non-string input is outside the decode contract
function requireString(vin: unknown): string {
  if (typeof vin !== 'string') {
    throw new VinInputError(vin === null ? 'null' : typeof vin);
  }
  return vin;
}

export class VinDecoder {
  private readonly logger: Logger;
  private readonly vehicleTypes: readonly VehicleTypeSignature[];
  private readonly legalRelevanceRules: readonly LegalRelevanceRule[];

  constructor(options: VinDecoderOptions = {}) {
    this.logger = (options.logger ?? getLogger()).child('VIN Decoder');
    this.vehicleTypes = options.vehicleTypes ?? VEHICLE_TYPE_SIGNATURES;
    this.legalRelevanceRules = options.legalRelevanceRules ?? LEGAL_RELEVANCE_RULES;
  }

  validate(vin: unknown): ValidationResult {
    return validateVIN(requireString(vin));
  }

  /**
   * Decode a VIN:
   * 1. Validate format
   * 2. Extract components (WMI, model year, plant, vehicle type)
   * 3. Return a frozen record
   *
   * Validity is settled before the year lookup, so an unmapped year code
   * adds an error while isValid stays true.
   */
  decode(vin: unknown): DecodedVIN {
    const normalizedVIN = normalizeVIN(requireString(vin));
    this.logger.info(`Decoding VIN: ${normalizedVIN}`);

    const { isValid, errors } = validateVIN(normalizedVIN);

    if (!isValid) {
      this.logger.warn(`Invalid VIN ${normalizedVIN}`, { errors });
      return freezeRecord({
        vin: normalizedVIN,
        manufacturer: UNKNOWN,
        modelYear: 0,
        plantCode: '',
        vehicleType: '',
        isValid: false,
        errors,
      });
    }

    const wmi = normalizedVIN.substring(0, 3); // World Manufacturer Identifier
    const yearCode = normalizedVIN[9];
    const plantCode = normalizedVIN[10];

    const manufacturer = MANUFACTURERS[wmi] ?? `${UNKNOWN} (${wmi})`;

    const modelYear = MODEL_YEARS[yearCode] ?? 0;
    if (modelYear === 0) {
      errors.push(VIN_ERRORS.modelYear(yearCode));
      this.logger.warn(`Unmapped model year code ${yearCode} in VIN ${normalizedVIN}`);
    }

    const result = freezeRecord({
      vin: normalizedVIN,
      manufacturer,
      modelYear,
      plantCode,
      vehicleType: this.determineVehicleType(normalizedVIN),
      isValid: true,
      errors,
    });

    this.logger.info(`Successfully decoded VIN: ${manufacturer} ${modelYear}`);
    return result;
  }

  /**
   * Generate forensic summary for legal documentation
   */
  forensicSummary(vin: unknown): ForensicSummary {
    return this.summarize(this.decode(vin));
  }

  /**
   * Forensic view of an already decoded record
   */
  summarize(decoded: DecodedVIN): ForensicSummary {
    const chars = [...decoded.vin];

    return {
      vin: decoded.vin,
      manufacturer: decoded.manufacturer,
      modelYear: decoded.modelYear,
      vehicleType: decoded.vehicleType,
      validationStatus: decoded.isValid ? 'VALID' : 'INVALID',
      forensicNotes: {
        wmiCode: chars.slice(0, 3).join(''),
        plantCode: chars.length >= 11 ? chars[10] : UNKNOWN,
        serialNumber: chars.length >= 12 ? chars.slice(11).join('') : UNKNOWN,
      },
      legalRelevance: this.assessLegalRelevance(decoded),
    };
  }

  /**
   * Case identifier for evidence documents scanned against this vehicle
   * (last six characters of the VIN, e.g. VIN_066808)
   */
  caseIdFromVin(vin: unknown): string {
    const chars = [...normalizeVIN(requireString(vin))];
    return `VIN_${chars.slice(-CASE_ID_SUFFIX_LENGTH).join('')}`;
  }

  private determineVehicleType(vin: string): string {
    const match = this.vehicleTypes.find((signature) => vin.startsWith(signature.prefix));
    return match ? match.label : DEFAULT_VEHICLE_TYPE;
  }

  private assessLegalRelevance(decoded: DecodedVIN): LegalRelevance {
    const relevance: LegalRelevance = {};

    for (const rule of this.legalRelevanceRules) {
      if (rule.applies(decoded)) {
        this.logger.debug(`Legal relevance rule matched: ${rule.name}`);
        Object.assign(relevance, rule.facts);
      }
    }

    return relevance;
  }
}

function freezeRecord(record: Omit<DecodedVIN, 'errors'> & { errors: string[] }): DecodedVIN {
  return Object.freeze({ ...record, errors: Object.freeze([...record.errors]) });
}

let defaultDecoder: VinDecoder | null = null;

/**
 * Decoder bound to the process-wide logger, created on first use
 */
export function getVinDecoder(): VinDecoder {
  if (!defaultDecoder) {
    defaultDecoder = new VinDecoder();
  }
  return defaultDecoder;
}
