/**
 * Text parsing for BigInteger
 * Accepts an optional leading "-" and "_" digit grouping ("100_200_100").
 */

import { BigIntegerParseError } from './errors.js';

export type ParseMode = 'strict' | 'lenient';

export interface ParseOptions {
  /**
   * strict (default): any character other than a digit, "_" or a leading "-"
   * is rejected, and so is input without digits.
   * lenient: such characters are dropped; input without digits is zero.
   */
  mode?: ParseMode;
}

export interface ParsedDigits {
  negative: boolean;
  /** Least significant first, leading zeros already stripped */
  digits: number[];
}

const CODE_0 = 48;
const CODE_9 = 57;

function isDigitCode(code: number): boolean {
  return code >= CODE_0 && code <= CODE_9;
}

export function parseDigits(input: string, opts: ParseOptions = {}): ParsedDigits {
  const mode = opts.mode ?? 'strict';
  let negative = false;
  let start = 0;

  if (input[0] === '-') {
    negative = true;
    start = 1;
  }

  // Textual order is most significant first
  const msf: number[] = [];
  for (let i = start; i < input.length; i++) {
    const ch = input[i];
    if (ch === '_') continue;

    const code = input.charCodeAt(i);
    if (isDigitCode(code)) {
      msf.push(code - CODE_0);
    } else if (mode === 'strict') {
      throw new BigIntegerParseError(
        `Invalid character ${JSON.stringify(ch)} at position ${i} in ${JSON.stringify(input)}`,
        'invalid_character',
        input,
        i
      );
    }
  }

  if (msf.length === 0 && mode === 'strict') {
    throw new BigIntegerParseError(`No digits in ${JSON.stringify(input)}`, 'empty', input, input.length);
  }

  const digits = msf.reverse();
  while (digits.length > 0 && digits[digits.length - 1] === 0) digits.pop();

  return { negative: negative && digits.length > 0, digits };
}

/**
 * Non-throwing variant for callers that want to branch on the error
 */
export function tryParseDigits(
  input: string,
  opts: ParseOptions = {}
): ParsedDigits | BigIntegerParseError {
  try {
    return parseDigits(input, opts);
  } catch (err) {
    if (err instanceof BigIntegerParseError) return err;
    throw err;
  }
}
