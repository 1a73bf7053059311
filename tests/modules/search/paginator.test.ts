import { describe, it, expect } from '@jest/globals';
import { paginate, totalPages } from '../../../src/modules/search/paginator';

describe('paginate', () => {
  const items = [1, 2, 3, 4, 5];

  it('slices the requested page', () => {
    expect(paginate(items, 1, 2)).toEqual([1, 2]);
    expect(paginate(items, 2, 2)).toEqual([3, 4]);
  });

  it('returns a short last page', () => {
    expect(paginate(items, 3, 2)).toEqual([5]);
  });

  it('returns nothing past the end', () => {
    expect(paginate(items, 4, 2)).toEqual([]);
  });
});

describe('totalPages', () => {
  it('rounds up', () => {
    expect(totalPages(5, 2)).toBe(3);
    expect(totalPages(4, 2)).toBe(2);
  });

  it('is zero for an empty result', () => {
    expect(totalPages(0, 50)).toBe(0);
  });
});
