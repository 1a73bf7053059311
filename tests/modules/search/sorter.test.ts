import { describe, it, expect } from '@jest/globals';
import { compareProducts, sortProducts } from '../../../src/modules/search/sorter';
import { makeProduct } from '../../helpers/products';

const day = (d: number) => new Date(Date.UTC(2025, 0, d));

describe('sortProducts', () => {
  it('breaks name ties by creation time, then by id', () => {
    const late = makeProduct({ id: 1, name: 'Same', created_at: day(20) });
    const earlyHigh = makeProduct({ id: 3, name: 'Same', created_at: day(1) });
    const earlyLow = makeProduct({ id: 2, name: 'Same', created_at: day(1) });
    const products = [late, earlyHigh, earlyLow];

    expect(sortProducts(products, 'name', 'asc').map(p => p.id)).toEqual([2, 3, 1]);
    expect(sortProducts(products, 'name', 'desc').map(p => p.id)).toEqual([1, 3, 2]);
  });

  it('defaults to last update, newest first, falling back to creation time', () => {
    const neverUpdated = makeProduct({ id: 1, created_at: day(5), updated_at: null });
    const updatedEarly = makeProduct({ id: 2, created_at: day(1), updated_at: day(3) });
    const updatedLate = makeProduct({ id: 3, created_at: day(2), updated_at: day(10) });

    expect(sortProducts([neverUpdated, updatedEarly, updatedLate]).map(p => p.id)).toEqual([3, 1, 2]);
  });

  it('falls back to name ascending for an unknown key, whatever the direction', () => {
    const products = [
      makeProduct({ id: 1, name: 'b' }),
      makeProduct({ id: 2, name: 'a' }),
      makeProduct({ id: 3, name: 'c' }),
    ];

    expect(sortProducts(products, 'popularity', 'desc').map(p => p.name)).toEqual(['a', 'b', 'c']);
  });

  it('accepts sort keys in any case', () => {
    const products = [makeProduct({ id: 1, name: 'b' }), makeProduct({ id: 2, name: 'a' })];

    expect(sortProducts(products, 'NAME', 'asc').map(p => p.name)).toEqual(['a', 'b']);
  });

  it('compares numeric keys numerically', () => {
    const products = [
      makeProduct({ id: 1, weight: 10 }),
      makeProduct({ id: 2, weight: 2 }),
      makeProduct({ id: 3, weight: 33 }),
    ];

    expect(sortProducts(products, 'weight', 'asc').map(p => p.weight)).toEqual([2, 10, 33]);
  });

  it('sorts by legacy category, or the linked category when that is empty', () => {
    const products = [
      makeProduct({ id: 1, category: 'Mutfak' }),
      makeProduct({ id: 2, category: null, category_name: 'Banyo' }),
      makeProduct({ id: 3, category: 'Bahçe' }),
    ];

    expect(sortProducts(products, 'category', 'asc').map(p => p.id)).toEqual([3, 2, 1]);
  });

  it('does not reorder its input', () => {
    const products = [makeProduct({ id: 1, name: 'b' }), makeProduct({ id: 2, name: 'a' })];
    sortProducts(products, 'name', 'asc');

    expect(products.map(p => p.id)).toEqual([1, 2]);
  });
});

describe('compareProducts', () => {
  it('returns zero only for the same record', () => {
    const product = makeProduct({ id: 7, name: 'X' });
    const twin = makeProduct({ id: 8, name: 'X' });

    expect(compareProducts(product, product, 'name', 'asc')).toBe(0);
    expect(compareProducts(product, twin, 'name', 'asc')).toBeLessThan(0);
    expect(compareProducts(product, twin, 'name', 'desc')).toBeGreaterThan(0);
  });
});
