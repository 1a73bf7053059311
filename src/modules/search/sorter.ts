import { Product } from '../../connections/db/models/product.model';
import { SortDirection, SortKey } from './search.types';

export const DEFAULT_SORT_KEY: SortKey = 'updated';
export const DEFAULT_SORT_DIRECTION: SortDirection = 'desc';

type SortValue = string | number;

const PRIMARY_KEYS: Record<SortKey, (product: Product) => SortValue> = {
  name: p => p.name,
  brand: p => p.brand ?? '',
  category: p => p.category || p.category_name || '',
  sku: p => p.sku,
  weight: p => p.weight,
  desi: p => p.desi,
  warranty: p => p.warranty_months,
  created: p => p.created_at.getTime(),
  updated: p => (p.updated_at ?? p.created_at).getTime(),
};

const isSortKey = (value: string): value is SortKey => Object.prototype.hasOwnProperty.call(PRIMARY_KEYS, value);

const compareValues = (a: SortValue, b: SortValue): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

/**
 * Total order: primary key, then creation time, then id, all in the requested
 * direction. Unknown keys sort by name ascending.
 */
export const compareProducts = (
  a: Product,
  b: Product,
  sortBy: string = DEFAULT_SORT_KEY,
  direction: SortDirection = DEFAULT_SORT_DIRECTION
): number => {
  const key = sortBy.toLowerCase();
  const known = isSortKey(key);
  const primary = PRIMARY_KEYS[known ? key : 'name'];
  const sign = known && direction === 'desc' ? -1 : 1;

  const chain = [
    compareValues(primary(a), primary(b)),
    // 'created' is already the primary key
    key === 'created' ? 0 : compareValues(a.created_at.getTime(), b.created_at.getTime()),
    compareValues(a.id, b.id),
  ];

  const decided = chain.find(result => result !== 0) ?? 0;
  return sign * decided;
};

/**
 * Returns a sorted copy; the input is left untouched
 */
export const sortProducts = (
  products: readonly Product[],
  sortBy?: string,
  direction?: SortDirection
): Product[] => [...products].sort((a, b) => compareProducts(a, b, sortBy, direction));
