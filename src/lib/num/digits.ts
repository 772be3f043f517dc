import { InvalidPositionError } from './errors.js';

export const BASE = 10;

/**
 * Decimal digits, least significant first.
 *
 * Reads past the end yield 0 so that the arithmetic loops can walk two
 * sequences of different length. Writes must land on an existing slot.
 */
export class DigitSequence {
  private data: number[];

  constructor(digits: readonly number[] = []) {
    this.data = [...digits];
  }

  get length(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  at(pos: number): number {
    if (pos >= 0 && pos < this.data.length) return this.data[pos];
    return 0;
  }

  set(pos: number, digit: number): void {
    if (pos >= 0 && pos < this.data.length) {
      this.data[pos] = digit;
      return;
    }
    throw new InvalidPositionError(pos, this.data.length);
  }

  push(digit: number): void {
    this.data.push(digit);
  }

  /**
   * Append a carry, one digit at a time
   */
  pushCarry(carry: number): void {
    let rest = carry;
    while (rest > 0) {
      this.data.push(rest % BASE);
      rest = Math.floor(rest / BASE);
    }
  }

  /**
   * Shift left by one decimal place (multiply the magnitude by 10)
   */
  shift(): void {
    if (this.data.length > 0) this.data.unshift(0);
  }

  /**
   * Drop most-significant zero digits
   */
  trim(): void {
    while (this.data.length > 0 && this.data[this.data.length - 1] === 0) {
      this.data.pop();
    }
  }

  clone(): DigitSequence {
    return new DigitSequence(this.data);
  }

  /**
   * Hand the storage over to a new sequence and leave this one empty
   */
  take(): DigitSequence {
    const moved = new DigitSequence();
    moved.data = this.data;
    this.data = [];
    return moved;
  }

  equals(other: DigitSequence): boolean {
    if (this.data.length !== other.data.length) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }

  /**
   * Compare magnitudes: -1, 0 or 1
   */
  compare(other: DigitSequence): -1 | 0 | 1 {
    if (this.data.length !== other.data.length) {
      return this.data.length < other.data.length ? -1 : 1;
    }
    for (let i = this.data.length - 1; i >= 0; i--) {
      if (this.data[i] < other.data[i]) return -1;
      if (this.data[i] > other.data[i]) return 1;
    }
    return 0;
  }

  mostSignificantFirst(): number[] {
    return [...this.data].reverse();
  }
}
