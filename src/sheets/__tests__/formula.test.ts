/**
 * Formula Accumulator Tests
 */

import { describe, it, expect } from 'vitest';
import { MAX_AMOUNT, accumulate, formatTerm } from '../formula.js';
import { InvalidInputError } from '../../errors.js';

describe('formatTerm', () => {
  it('formats card amounts as plain two-decimal numbers', () => {
    expect(formatTerm(250, 'card')).toBe('250.00');
    expect(formatTerm(99.9, 'card')).toBe('99.90');
  });

  it('wraps cash amounts in parentheses', () => {
    expect(formatTerm(400, 'cash')).toBe('(400.00)');
  });

  it('rounds to two decimals only', () => {
    expect(formatTerm(12.3456, 'card')).toBe('12.35');
    expect(formatTerm(0.005, 'card')).toBe('0.01');
  });

  it('keeps the largest allowed amount in fixed notation', () => {
    expect(formatTerm(MAX_AMOUNT, 'cash')).toBe('(999999999999.99)');
  });

  it.each([0, -5, 0.004, 1e21, MAX_AMOUNT + 1, Number.NaN, Number.POSITIVE_INFINITY])('rejects %s', (amount) => {
    expect(() => formatTerm(amount, 'card')).toThrow(InvalidInputError);
  });
});

describe('accumulate', () => {
  it('starts a new formula when the cell is empty', () => {
    expect(accumulate('', 250, 'card')).toBe('=250.00');
    expect(accumulate('', 400, 'cash')).toBe('=(400.00)');
  });

  it('appends a card term to an existing formula', () => {
    expect(accumulate('=100.00+(20.00)', 35.5, 'card')).toBe('=100.00+(20.00)+35.50');
  });

  it('appends a cash term to an existing formula', () => {
    expect(accumulate('=100.00', 400, 'cash')).toBe('=100.00+(400.00)');
  });

  it('never rewrites existing terms', () => {
    const previous = '=SUM(A1:A3)+1.00';
    expect(accumulate(previous, 2, 'card')).toBe(`${previous}+2.00`);
  });

  it('appends a new term on every call', () => {
    const once = accumulate('', 10, 'card');
    const twice = accumulate(once, 10, 'card');
    expect(twice).toBe('=10.00+10.00');
  });
});
