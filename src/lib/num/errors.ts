/**
 * Error types raised by the BigInteger engine
 */

export type BigIntegerErrorCode =
  | 'invalid_position'
  | 'empty'
  | 'invalid_character'
  | 'not_an_integer';

export class BigIntegerError extends Error {
  constructor(message: string, public readonly code: BigIntegerErrorCode) {
    super(message);
    this.name = 'BigIntegerError';
  }
}

/**
 * A write to a digit slot that the sequence does not hold.
 * Always a programming error inside the engine.
 */
export class InvalidPositionError extends BigIntegerError {
  constructor(public readonly position: number, public readonly length: number) {
    super(`Invalid position: ${position} (length ${length})`, 'invalid_position');
    this.name = 'InvalidPositionError';
  }
}

export class BigIntegerParseError extends BigIntegerError {
  constructor(
    message: string,
    code: 'empty' | 'invalid_character',
    public readonly input: string,
    public readonly position: number
  ) {
    super(message, code);
    this.name = 'BigIntegerParseError';
  }
}

export class BigIntegerRangeError extends BigIntegerError {
  constructor(public readonly value: number) {
    super(`Not a safe integer: ${value}`, 'not_an_integer');
    this.name = 'BigIntegerRangeError';
  }
}
