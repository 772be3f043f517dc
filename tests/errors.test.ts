import { describe, test, expect } from '@jest/globals';
import { describeError, normalizeError } from '../src/utils/errors.js';
import { InvalidPositionError } from '../src/lib/num/errors.js';

describe('normalizeError', () => {
  test('keeps the code of engine errors', () => {
    expect(normalizeError(new InvalidPositionError(7, 3))).toEqual({
      name: 'InvalidPositionError',
      message: 'Invalid position: 7 (length 3)',
      code: 'invalid_position',
    });
  });

  test('plain errors and thrown values', () => {
    expect(normalizeError(new TypeError('bad'))).toEqual({ name: 'TypeError', message: 'bad' });
    expect(normalizeError('boom')).toEqual({ name: 'string', message: 'boom' });
  });

  test('describeError renders one line', () => {
    expect(describeError(new InvalidPositionError(7, 3))).toBe('InvalidPositionError [invalid_position]: Invalid position: 7 (length 3)');
    expect(describeError(new Error('nope'))).toBe('Error: nope');
  });
});
