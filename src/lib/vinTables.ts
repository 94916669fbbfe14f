/**
 * VIN Lookup Tables
 *
 * Static data consulted by the decoder. Extending coverage means editing
 * these tables, not the decode logic.
 */

import type { LegalRelevanceRule, VehicleTypeSignature } from './vinTypes';

// World Manufacturer Identifier (positions 1-3)
export const MANUFACTURERS: Readonly<Record<string, string>> = Object.freeze({
  KM8: 'Hyundai Motor Company',
  '1G1': 'General Motors',
  JHM: 'Honda',
  WBA: 'BMW',
});

// Model year code (position 10)
export const MODEL_YEARS: Readonly<Record<string, number>> = Object.freeze({
  L: 2020,
  M: 2021,
  N: 2022,
  P: 2023,
  R: 2024,
  S: 2025,
});

// Evaluated in order, first match wins: most specific signature first
const vehicleTypeSignatures: VehicleTypeSignature[] = [
  { prefix: 'KM8R54HE', label: 'Palisade SUV' },
  { prefix: 'KM8', label: 'Hyundai Vehicle' },
];

export const VEHICLE_TYPE_SIGNATURES: readonly VehicleTypeSignature[] =
  Object.freeze(vehicleTypeSignatures);

export const DEFAULT_VEHICLE_TYPE = 'Unknown Vehicle Type';

const legalRelevanceRules: LegalRelevanceRule[] = [
  {
    name: 'palisade-oil-consumption',
    applies: (decoded) => decoded.vehicleType.includes('Palisade'),
    facts: Object.freeze({
      knownIssues: 'Oil consumption defects documented in class action suits',
      warrantyStatus: '10-year powertrain warranty applicable',
      recallPotential: 'Check NHTSA database for active recalls',
    }),
  },
];

export const LEGAL_RELEVANCE_RULES: readonly LegalRelevanceRule[] =
  Object.freeze(legalRelevanceRules);
