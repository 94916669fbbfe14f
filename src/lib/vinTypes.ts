/**
 * VIN Decode Types
 *
 * Shapes produced by the VIN validator and decoder.
 */

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export interface DecodedVIN {
  readonly vin: string; // Normalized (uppercase)
  readonly manufacturer: string;
  readonly modelYear: number; // 0 when the year code is unresolved
  readonly plantCode: string;
  readonly vehicleType: string;
  readonly isValid: boolean;
  readonly errors: readonly string[];
}

export type ValidationStatus = 'VALID' | 'INVALID';

export interface ForensicNotes {
  wmiCode: string;
  plantCode: string;
  serialNumber: string;
}

/**
 * Facts attached to a summary for case documentation
 * (e.g. knownIssues, warrantyStatus, recallPotential)
 */
export type LegalRelevance = Record<string, string>;

export interface ForensicSummary {
  vin: string;
  manufacturer: string;
  modelYear: number;
  vehicleType: string;
  validationStatus: ValidationStatus;
  forensicNotes: ForensicNotes;
  legalRelevance: LegalRelevance;
}

export interface VehicleTypeSignature {
  prefix: string;
  label: string;
}

export interface LegalRelevanceRule {
  name: string;
  applies: (decoded: DecodedVIN) => boolean;
  facts: Readonly<LegalRelevance>;
}
