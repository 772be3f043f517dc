import { describe, test, expect } from '@jest/globals';
import { DigitSequence } from './digits.js';
import { InvalidPositionError } from './errors.js';

describe('DigitSequence', () => {
  test('reads beyond the stored length as zero', () => {
    const seq = new DigitSequence([4, 2]);
    expect(seq.at(0)).toBe(4);
    expect(seq.at(1)).toBe(2);
    expect(seq.at(2)).toBe(0);
    expect(seq.at(-1)).toBe(0);
  });

  test('writes outside the sequence throw with the position', () => {
    const seq = new DigitSequence([1, 2, 3]);
    expect(() => seq.set(3, 5)).toThrow(InvalidPositionError);
    try {
      seq.set(-2, 5);
      throw new Error('expected a throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPositionError);
      if (err instanceof InvalidPositionError) {
        expect(err.position).toBe(-2);
        expect(err.length).toBe(3);
        expect(err.code).toBe('invalid_position');
        expect(err.message).toBe('Invalid position: -2 (length 3)');
      }
    }
  });

  test('pushCarry appends one digit per decimal place', () => {
    const seq = new DigitSequence([9]);
    seq.pushCarry(123);
    expect(seq.mostSignificantFirst()).toEqual([1, 2, 3, 9]);
    seq.pushCarry(0);
    expect(seq.length).toBe(4);
  });

  test('shift multiplies by ten, except for zero', () => {
    const seq = new DigitSequence([7, 1]);
    seq.shift();
    expect(seq.mostSignificantFirst()).toEqual([1, 7, 0]);

    const empty = new DigitSequence();
    empty.shift();
    expect(empty.isEmpty()).toBe(true);
  });

  test('trim drops most-significant zeros only', () => {
    const seq = new DigitSequence([0, 5, 0, 0]);
    seq.trim();
    expect(seq.mostSignificantFirst()).toEqual([5, 0]);

    const zeros = new DigitSequence([0, 0]);
    zeros.trim();
    expect(zeros.length).toBe(0);
  });

  test('take leaves the source empty', () => {
    const seq = new DigitSequence([1, 2]);
    const moved = seq.take();
    expect(moved.mostSignificantFirst()).toEqual([2, 1]);
    expect(seq.isEmpty()).toBe(true);
  });

  test('clone does not share storage', () => {
    const seq = new DigitSequence([1, 2]);
    const copy = seq.clone();
    copy.set(0, 9);
    expect(seq.at(0)).toBe(1);
    expect(seq.equals(copy)).toBe(false);
  });

  test('compare orders by length, then from the top digit', () => {
    expect(new DigitSequence([9]).compare(new DigitSequence([0, 1]))).toBe(-1);
    expect(new DigitSequence([1, 3]).compare(new DigitSequence([9, 2]))).toBe(1);
    expect(new DigitSequence([4, 4]).compare(new DigitSequence([4, 4]))).toBe(0);
  });
});
