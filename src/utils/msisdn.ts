/**
 * MSISDN normalization
 *
 * Canonical form is E.164 with a leading '+', parsed with libphonenumber-js.
 */

import { parsePhoneNumberFromString } from 'libphonenumber-js';

const E164_PATTERN = /^\+[1-9]\d{7,14}$/;

/**
 * Normalize a phone number to E.164.
 * Returns null when the input cannot be a phone number.
 */
export function normalizeMsisdn(input: string): string | null {
  const digits = input.replace(/[\s\-().]/g, '').replace(/^00/, '+');
  const candidate = digits.startsWith('+') ? digits : `+${digits}`;

  if (!/^\+\d+$/.test(candidate)) {
    return null;
  }

  const normalized = parsePhoneNumberFromString(candidate)?.number ?? candidate;

  return E164_PATTERN.test(normalized) ? normalized : null;
}
