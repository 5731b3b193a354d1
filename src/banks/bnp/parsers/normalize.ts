/**
 * Value normalization for BNPNet exports.
 *
 * The portal prints dates as DD/MM/YY and amounts with a decimal comma
 * (`123,75`). Both become their ISO / dot-decimal forms here.
 */

import { ParseError } from '../../../shared/errors.js';

export interface NormalizedAmount {
  /** Numeric value */
  value: number;
  /** Dot-decimal text with the source digits kept (`-12,00` -> `-12.00`) */
  text: string;
}

const DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{2})$/;
const AMOUNT_PATTERN = /^([+-]?)(\d+),(\d+)$/;

/**
 * Convert `DD/MM/YY` to `YYYY-MM-DD`.
 *
 * Two-digit years starting with 7, 8 or 9 belong to the 1900s, every other
 * year to the 2000s. Day and month are not range-checked.
 */
export function normalizeDate(value: string): string {
  const match = value.trim().match(DATE_PATTERN);
  if (!match) {
    throw new ParseError(`Invalid date "${value}", expected DD/MM/YY`, { field: 'date', line: value });
  }

  const [, day, month, year] = match;
  const century = /^[789]/.test(year) ? '19' : '20';
  return `${century}${year}-${month}-${day}`;
}

/**
 * Convert a decimal-comma amount (`1234,56`, `-12,00`) to a number.
 * Thousands separators are not accepted.
 */
export function normalizeAmount(value: string): NormalizedAmount {
  const match = value.trim().match(AMOUNT_PATTERN);
  if (!match) {
    throw new ParseError(`Invalid amount "${value}", expected digits with a decimal comma`, {
      field: 'amount',
      line: value
    });
  }

  const [, sign, units, decimals] = match;
  const text = `${sign === '-' ? '-' : ''}${units}.${decimals}`;
  return { value: Number(text), text };
}

/**
 * Collapse every whitespace run to a single space
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ');
}
