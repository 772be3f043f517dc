/**
 * Rendering BigInteger values as text
 */

import type { BigInteger } from './BigInteger.js';

export interface FormatOptions {
  /** Group thousands (default: false) */
  grouped?: boolean;
  /** Group separator (default: ",") */
  separator?: string;
}

/**
 * Add a separator between groups of three digits
 */
function groupThousands(digits: string, separator: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
}

/**
 * Canonical decimal text ("-" when negative, "0" for zero)
 */
export function formatExact(value: BigInteger): string {
  return value.toString();
}

export function formatGrouped(value: BigInteger, separator = ','): string {
  const body = groupThousands(value.abs().toString(), separator);
  return value.isNegative() ? `-${body}` : body;
}

export function formatBigInteger(value: BigInteger, opts: FormatOptions = {}): string {
  if (opts.grouped) return formatGrouped(value, opts.separator ?? ',');
  return formatExact(value);
}
