import { describe, it, expect } from '@jest/globals';
import { always, and, fieldFilled, isFilled, not, or } from '../../../src/modules/search/predicate';

const isEven = (n: number) => n % 2 === 0;
const isPositive = (n: number) => n > 0;

describe('predicate combinators', () => {
  it('and requires every predicate', () => {
    const evenAndPositive = and(isEven, isPositive);
    expect(evenAndPositive(4)).toBe(true);
    expect(evenAndPositive(-4)).toBe(false);
    expect(evenAndPositive(3)).toBe(false);
  });

  it('or requires any predicate', () => {
    const evenOrPositive = or(isEven, isPositive);
    expect(evenOrPositive(-4)).toBe(true);
    expect(evenOrPositive(3)).toBe(true);
    expect(evenOrPositive(-3)).toBe(false);
  });

  it('not negates', () => {
    expect(not(isEven)(3)).toBe(true);
    expect(not(isEven)(2)).toBe(false);
  });

  it('empty and is true, empty or is false', () => {
    expect(and<number>()(1)).toBe(true);
    expect(or<number>()(1)).toBe(false);
    expect(always<number>()(1)).toBe(true);
  });
});

describe('fieldFilled', () => {
  it('treats null, undefined and empty string as unset', () => {
    expect(isFilled(null)).toBe(false);
    expect(isFilled(undefined)).toBe(false);
    expect(isFilled('')).toBe(false);
    expect(isFilled(' ')).toBe(true);
  });

  it('reads the value through the accessor', () => {
    const hasCode = fieldFilled<{ code: string | null }>(item => item.code);
    expect(hasCode({ code: 'X1' })).toBe(true);
    expect(hasCode({ code: null })).toBe(false);
  });
});
