/**
 * VIN Validation Utility
 * Implements ISO 3779 standard for Vehicle Identification Numbers
 */

import type { ValidationResult } from './vinTypes';

// ============================================================================
// VIN Validation Constants
// ============================================================================

export const VIN_LENGTH = 17;

// Character transliteration map (ISO 3779)
const VIN_TRANSLITERATION: Readonly<Record<string, number>> = {
  A: 1, B: 2, C: 3, D: 4, E: 5, F: 6, G: 7, H: 8,
  J: 1, K: 2, L: 3, M: 4, N: 5, P: 7, R: 9,
  S: 2, T: 3, U: 4, V: 5, W: 6, X: 7, Y: 8, Z: 9,
  '0': 0, '1': 1, '2': 2, '3': 3, '4': 4,
  '5': 5, '6': 6, '7': 7, '8': 8, '9': 9
};

// Weight factors for check digit calculation
const VIN_WEIGHTS = [8, 7, 6, 5, 4, 3, 2, 10, 0, 9, 8, 7, 6, 5, 4, 3, 2];

const CHECK_DIGIT_INDEX = 8;

// Permitted alphabet, checked per character so short input only fails on length
const VIN_ALPHABET = /^[A-HJ-NPR-Z0-9]*$/i;

export const VIN_ERRORS = {
  empty: 'VIN cannot be empty',
  length: (actual: number) => `VIN must be 17 characters, got ${actual}`,
  characters: 'VIN contains invalid characters (I, O, Q not allowed)',
  checkDigit: 'Invalid VIN check digit',
  modelYear: (code: string) => `Unknown model year code: ${code}`,
} as const;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Run every structural check against a VIN, collecting a message per failure.
 *
 * An empty VIN short-circuits with a single error. Otherwise the length,
 * alphabet and check digit checks each run regardless of the others; the
 * check digit is only tested on 17-character input.
 */
export function validateVIN(vin: string): ValidationResult {
  const errors: string[] = [];

  if (vin.length === 0) {
    errors.push(VIN_ERRORS.empty);
    return { isValid: false, errors };
  }

  // Code points of the raw input, before any case mapping
  const length = [...vin].length;

  if (length !== VIN_LENGTH) {
    errors.push(VIN_ERRORS.length(length));
  }

  if (!VIN_ALPHABET.test(vin)) {
    errors.push(VIN_ERRORS.characters);
  }

  if (length === VIN_LENGTH && !hasValidCheckDigit(vin)) {
    errors.push(VIN_ERRORS.checkDigit);
  }

  return { isValid: errors.length === 0, errors };
}

/**
 * Uppercase the ASCII letters of a VIN, leaving every other character and
 * the length untouched
 */
export function normalizeVIN(vin: string): string {
  return vin.replace(/[a-z]+/g, (letters) => letters.toUpperCase());
}

/**
 * Whether position 9 of a 17-character VIN matches its computed check digit
 */
export function hasValidCheckDigit(vin: string): boolean {
  const normalizedVIN = normalizeVIN(vin);
  const calculated = calculateCheckDigit(normalizedVIN);

  return calculated !== null && calculated === normalizedVIN[CHECK_DIGIT_INDEX];
}

/**
 * Calculate VIN check digit per ISO 3779
 *
 * Algorithm:
 * 1. Transliterate each character to its numeric value
 * 2. Multiply by position weight factor
 * 3. Sum all products
 * 4. Take modulo 11
 * 5. If 10, check digit is 'X', otherwise the digit itself
 *
 * @param vin - 17-character VIN (uppercase)
 * @returns Check digit ('0'-'9' or 'X'), or null when the VIN cannot be weighed
 */
export function calculateCheckDigit(vin: string): string | null {
  const chars = [...vin];
  if (chars.length !== VIN_LENGTH) {
    return null;
  }

  let sum = 0;

  for (let i = 0; i < VIN_LENGTH; i++) {
    const value = VIN_TRANSLITERATION[chars[i]];

    if (value === undefined) {
      return null;
    }

    sum += value * VIN_WEIGHTS[i];
  }

  const remainder = sum % 11;
  return remainder === 10 ? 'X' : String(remainder);
}
