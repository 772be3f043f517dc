/**
 * Arbitrary-precision signed integers over decimal digits
 *
 * Magnitude lives in a DigitSequence (one decimal digit per slot, least
 * significant first) and the sign is a separate flag, so there is no
 * complement form. Schoolbook addition, subtraction and multiplication run
 * directly on the digits.
 *
 * Normalized form:
 * - no most-significant zero digits
 * - zero is the empty sequence with Sign.Positive
 */

import { BASE, DigitSequence } from './digits.js';
import { BigIntegerRangeError } from './errors.js';
import { parseDigits, tryParseDigits, type ParseOptions } from './parse.js';

export enum Sign {
  Positive = 'positive',
  Negative = 'negative',
}

export type BigIntegerLike = BigInteger | number | bigint | string;

function assertSafeInteger(n: number): void {
  if (!Number.isSafeInteger(n)) throw new BigIntegerRangeError(n);
}

export class BigInteger {
  private _sign: Sign;
  private digits: DigitSequence;

  private constructor(sign: Sign, digits: DigitSequence) {
    this._sign = sign;
    this.digits = digits;
    this.normalize();
  }

  // ============================================================================
  // Construction
  // ============================================================================

  static zero(): BigInteger {
    return new BigInteger(Sign.Positive, new DigitSequence());
  }

  /**
   * From a native safe integer
   */
  static fromNumber(value: number): BigInteger {
    assertSafeInteger(value);
    const sign = value < 0 ? Sign.Negative : Sign.Positive;
    const digits = new DigitSequence();
    let rest = Math.abs(value);
    while (rest > 0) {
      digits.push(rest % BASE);
      rest = Math.floor(rest / BASE);
    }
    return new BigInteger(sign, digits);
  }

  static fromBigInt(value: bigint): BigInteger {
    const sign = value < 0n ? Sign.Negative : Sign.Positive;
    const digits = new DigitSequence();
    let rest = value < 0n ? -value : value;
    while (rest > 0n) {
      digits.push(Number(rest % 10n));
      rest /= 10n;
    }
    return new BigInteger(sign, digits);
  }

  /**
   * From text: optional leading "-", "_" separators ignored
   * Examples: "42", "-17", "100_200_100"
   */
  static parse(input: string, opts: ParseOptions = {}): BigInteger {
    const { negative, digits } = parseDigits(input, opts);
    return new BigInteger(negative ? Sign.Negative : Sign.Positive, new DigitSequence(digits));
  }

  /**
   * Like parse, but yields null instead of throwing on malformed text
   */
  static tryParse(input: string, opts: ParseOptions = {}): BigInteger | null {
    const parsed = tryParseDigits(input, opts);
    if (parsed instanceof Error) return null;
    return new BigInteger(parsed.negative ? Sign.Negative : Sign.Positive, new DigitSequence(parsed.digits));
  }

  static from(value: BigIntegerLike): BigInteger {
    if (value instanceof BigInteger) return value.clone();
    if (typeof value === 'number') return BigInteger.fromNumber(value);
    if (typeof value === 'bigint') return BigInteger.fromBigInt(value);
    return BigInteger.parse(value);
  }

  // ============================================================================
  // Ownership
  // ============================================================================

  clone(): BigInteger {
    return new BigInteger(this._sign, this.digits.clone());
  }

  /**
   * Move: the returned value owns the digits, this one is left as zero
   */
  take(): BigInteger {
    const moved = new BigInteger(this._sign, this.digits.take());
    this._sign = Sign.Positive;
    return moved;
  }

  /**
   * Copy assignment
   */
  assign(other: BigInteger): this {
    if (other === this) return this;
    this._sign = other._sign;
    this.digits = other.digits.clone();
    return this;
  }

  /**
   * Move assignment: takes other's digits and leaves other as zero
   */
  assignFrom(other: BigInteger): this {
    if (other === this) return this;
    this._sign = other._sign;
    this.digits = other.digits.take();
    other._sign = Sign.Positive;
    return this;
  }

  // ============================================================================
  // Basic properties
  // ============================================================================

  get sign(): Sign {
    return this._sign;
  }

  /** Number of stored digits; 0 for zero */
  get digitCount(): number {
    return this.digits.length;
  }

  /** Digit at a position (least significant is 0); 0 beyond the stored length */
  digitAt(pos: number): number {
    return this.digits.at(pos);
  }

  isZero(): boolean {
    return this.digits.isEmpty();
  }

  isPositive(): boolean {
    return this._sign === Sign.Positive;
  }

  isNegative(): boolean {
    return this._sign === Sign.Negative;
  }

  negate(): BigInteger {
    const flipped = this.isNegative() ? Sign.Positive : Sign.Negative;
    return new BigInteger(flipped, this.digits.clone());
  }

  abs(): BigInteger {
    return new BigInteger(Sign.Positive, this.digits.clone());
  }

  // ============================================================================
  // Arithmetic (binary forms leave both operands untouched)
  // ============================================================================

  add(other: BigInteger): BigInteger {
    return this.clone().addAssign(other);
  }

  sub(other: BigInteger): BigInteger {
    return this.clone().subAssign(other);
  }

  mul(other: BigInteger): BigInteger {
    return this.clone().mulAssign(other);
  }

  mulSmall(n: number): BigInteger {
    return this.clone().mulSmallAssign(n);
  }

  addAssign(other: BigInteger): this {
    if (other === this) return this.mulSmallAssign(2);
    if (other.isZero()) return this;

    if (this._sign !== other._sign) return this.subAssign(other.negate());

    const lhsLen = this.digits.length;
    const width = Math.max(lhsLen, other.digits.length);
    let carry = 0;

    for (let i = 0; i < width; i++) {
      const sum = this.digits.at(i) + other.digits.at(i) + carry;
      carry = Math.floor(sum / BASE);
      if (i < lhsLen) this.digits.set(i, sum % BASE);
      else this.digits.push(sum % BASE);
    }
    this.digits.pushCarry(carry);

    return this;
  }

  subAssign(other: BigInteger): this {
    if (other === this) return this.assignFrom(BigInteger.zero());
    if (other.isZero()) return this;

    if (this._sign !== other._sign) return this.addAssign(other.negate());

    // Minuend magnitude too small: compute other - this and flip
    if ((this.isPositive() && this.lt(other)) || (this.isNegative() && this.gt(other))) {
      const reversed = other.sub(this);
      reversed._sign = reversed.isPositive() ? Sign.Negative : Sign.Positive;
      return this.assignFrom(reversed);
    }

    let borrow = 0;
    for (let i = 0; i < this.digits.length; i++) {
      let diff = this.digits.at(i) - other.digits.at(i) - borrow;
      borrow = 0;
      if (diff < 0) {
        diff += BASE;
        borrow = 1;
      }
      this.digits.set(i, diff);
    }
    this.normalize();

    return this;
  }

  mulAssign(other: BigInteger): this {
    const negative = this._sign !== other._sign;

    // Work on magnitudes; the sign goes on at the end
    const shifted = this.abs();
    const sum = BigInteger.zero();
    for (let i = 0; i < other.digits.length; i++) {
      sum.addAssign(shifted.mulSmall(other.digits.at(i)));
      shifted.digits.shift();
    }

    this.assignFrom(sum);
    this._sign = negative ? Sign.Negative : Sign.Positive;
    this.normalize();

    return this;
  }

  /**
   * Multiply by a native integer. 0 < n <= 10 runs digit by digit,
   * anything else is promoted to a BigInteger.
   */
  mulSmallAssign(n: number): this {
    assertSafeInteger(n);

    if (n === 0) return this.assignFrom(BigInteger.zero());
    if (n === 1) return this;
    if (n < 0 || n > BASE) return this.mulAssign(BigInteger.fromNumber(n));

    let carry = 0;
    for (let i = 0; i < this.digits.length; i++) {
      const product = n * this.digits.at(i) + carry;
      carry = Math.floor(product / BASE);
      this.digits.set(i, product % BASE);
    }
    this.digits.pushCarry(carry);

    return this;
  }

  // ============================================================================
  // Comparison
  // ============================================================================

  /**
   * Returns: -1 if this < other, 0 if equal, 1 if this > other
   */
  cmp(other: BigInteger): -1 | 0 | 1 {
    if (this._sign !== other._sign) return this.isNegative() ? -1 : 1;

    const magCmp = this.digits.compare(other.digits);
    if (this.isNegative()) {
      // Both negative: the larger magnitude is the smaller value
      if (magCmp === -1) return 1;
      if (magCmp === 1) return -1;
    }
    return magCmp;
  }

  /** Structural equality: same sign and same digits */
  eq(other: BigInteger): boolean {
    return this._sign === other._sign && this.digits.equals(other.digits);
  }

  ne(other: BigInteger): boolean { return !this.eq(other); }
  lt(other: BigInteger): boolean { return this.cmp(other) === -1; }
  lte(other: BigInteger): boolean { return this.eq(other) || this.lt(other); }
  gt(other: BigInteger): boolean { return other.lt(this); }
  gte(other: BigInteger): boolean { return this.eq(other) || this.gt(other); }

  // ============================================================================
  // Conversion
  // ============================================================================

  toString(): string {
    if (this.digits.isEmpty()) return '0';
    const body = this.digits.mostSignificantFirst().join('');
    return this.isNegative() ? `-${body}` : body;
  }

  toJSON(): string {
    return this.toString();
  }

  toBigInt(): bigint {
    return BigInt(this.toString());
  }

  private normalize(): void {
    this.digits.trim();
    if (this.digits.isEmpty()) this._sign = Sign.Positive;
  }
}

// ============================================================================
// Utility functions
// ============================================================================

export function compare(a: BigInteger, b: BigInteger): -1 | 0 | 1 {
  return a.cmp(b);
}

// These return copies: the arguments are mutable and stay with the caller

export function min(a: BigInteger, b: BigInteger): BigInteger {
  return (a.lt(b) ? a : b).clone();
}

export function max(a: BigInteger, b: BigInteger): BigInteger {
  return (a.gt(b) ? a : b).clone();
}

export function clamp(value: BigInteger, lo: BigInteger, hi: BigInteger): BigInteger {
  if (value.lt(lo)) return lo.clone();
  if (value.gt(hi)) return hi.clone();
  return value.clone();
}
