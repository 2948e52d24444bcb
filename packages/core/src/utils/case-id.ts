/**
 * Case number normalization
 */

import { Errors } from '../errors.js';
import { fail, ok, type Result } from '../result.js';
import type { CaseIdentifier } from '../types/case.js';
import { CASE_DEFAULTS } from '../constants.js';

const CASE_NUMBER_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Normalize raw operator input into a case identifier.
 * "5" becomes "005" at the default width; longer numbers are kept as entered.
 * @param input - Case number as typed
 * @param width - Minimum width, padded with leading zeros
 */
export function parseCaseIdentifier(
  input: string,
  width: number = CASE_DEFAULTS.NUMBER_WIDTH
): Result<CaseIdentifier> {
  const trimmed = input.trim();

  if (trimmed.length === 0) {
    return fail(Errors.invalidCaseNumber(input, 'case number is required'));
  }

  if (!CASE_NUMBER_PATTERN.test(trimmed)) {
    return fail(
      Errors.invalidCaseNumber(input, 'only letters, digits, "-" and "_" are allowed')
    );
  }

  const number = trimmed.padStart(width, '0');

  return ok(
    Object.freeze({
      number,
      directoryName: `${CASE_DEFAULTS.DIRECTORY_PREFIX}${number}`,
    })
  );
}

/**
 * Like {@link parseCaseIdentifier}, but throws the INVALID_CASE_NUMBER error
 */
export function normalizeCaseNumber(input: string, width?: number): CaseIdentifier {
  const result = parseCaseIdentifier(input, width);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
