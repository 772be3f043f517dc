/**
 * Arbitrary-precision signed integers over decimal digits
 */

export {
  BigInteger,
  Sign,
  compare,
  min,
  max,
  clamp
} from './BigInteger.js';

export type { BigIntegerLike } from './BigInteger.js';

export { BASE, DigitSequence } from './digits.js';

export {
  BigIntegerError,
  BigIntegerParseError,
  BigIntegerRangeError,
  InvalidPositionError
} from './errors.js';

export type { BigIntegerErrorCode } from './errors.js';

export { parseDigits, tryParseDigits } from './parse.js';

export type { ParseMode, ParseOptions, ParsedDigits } from './parse.js';

export { formatExact, formatGrouped, formatBigInteger } from './format.js';

export type { FormatOptions } from './format.js';

export { writeBigInteger, TokenReader, readBigIntegers } from './stream.js';
