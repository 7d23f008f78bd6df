import { describe, it, expect } from 'vitest';
import { monthName, parsePaymentToken } from '../vocabulary.js';

describe('monthName', () => {
  it('returns 1-based month names per locale', () => {
    expect(monthName('en', 1)).toBe('January');
    expect(monthName('ru', 10)).toBe('Октябрь');
    expect(monthName('ru', 12)).toBe('Декабрь');
  });

  it('throws RangeError outside 1..12', () => {
    expect(() => monthName('en', 0)).toThrow(RangeError);
    expect(() => monthName('en', 13)).toThrow(RangeError);
  });
});

describe('parsePaymentToken', () => {
  it('accepts tokens from every locale regardless of case', () => {
    expect(parsePaymentToken('card')).toBe('card');
    expect(parsePaymentToken(' CASH ')).toBe('cash');
    expect(parsePaymentToken('Карта')).toBe('card');
    expect(parsePaymentToken('нал')).toBe('cash');
  });

  it('returns undefined for anything else', () => {
    expect(parsePaymentToken('bitcoin')).toBeUndefined();
    expect(parsePaymentToken('')).toBeUndefined();
  });
});
