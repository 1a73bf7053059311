import {
  IMAGE_URL_FIELDS,
  MARKETPLACE_BARCODE_FIELDS,
  Product,
} from '../../connections/db/models/product.model';
import { anyBarcodeFilled, barcodeTypePredicate } from './barcode.fields';
import { matchesToken, tokenize } from './normalize';
import { Predicate, always, and, fieldFilled, not, or } from './predicate';
import { ProductStatus, SearchCriteria } from './search.types';

type TextAccessor = (product: Product) => string | null | undefined;

// Fields scanned by free-text search
const SEARCHABLE_TEXT_FIELDS: TextAccessor[] = [
  p => p.name,
  p => p.sku,
  p => p.brand,
  p => p.ean_code,
  p => p.description,
  p => p.features,
  p => p.material,
  p => p.color,
  p => p.notes,
  p => p.category,
  p => p.category_name,
  ...MARKETPLACE_BARCODE_FIELDS.map((field): TextAccessor => p => p[field]),
];

const hasText = (value: string | undefined): value is string =>
  value !== undefined && value.trim().length > 0;

const isArchived: Predicate<Product> = product => product.is_archived;

export const statusPredicate = (status: ProductStatus | undefined): Predicate<Product> => {
  switch (status) {
    case 'all':
      return always();
    case 'archived':
      return isArchived;
    case 'active':
    default:
      return not(isArchived);
  }
};

/**
 * Every token must hit some field; different tokens may hit different fields.
 */
export const searchTextPredicate = (searchText: string | undefined): Predicate<Product> => {
  const tokens = tokenize(searchText);
  if (tokens.length === 0) return always();

  return and(
    ...tokens.map(token => or(...SEARCHABLE_TEXT_FIELDS.map(
      (accessor): Predicate<Product> => product => matchesToken(accessor(product), token)
    )))
  );
};

export const categoryPredicate = (category: string): Predicate<Product> =>
  or<Product>(
    product => product.category === category,
    product => product.category_name === category
  );

const equals = (accessor: TextAccessor, expected: string): Predicate<Product> =>
  product => accessor(product) === expected;

const range = (
  accessor: (product: Product) => number,
  min: number | undefined,
  max: number | undefined
): Predicate<Product> => {
  const bounds: Predicate<Product>[] = [];
  if (min !== undefined) bounds.push(product => accessor(product) >= min);
  if (max !== undefined) bounds.push(product => accessor(product) <= max);
  return and(...bounds);
};

const anyImageFilled: Predicate<Product> = or(...IMAGE_URL_FIELDS.map(field => fieldFilled<Product>(p => p[field])));

const triState = (flag: boolean | undefined, whenTrue: Predicate<Product>): Predicate<Product> => {
  if (flag === undefined) return always();
  return flag ? whenTrue : not(whenTrue);
};

/**
 * Builds the single predicate shared by counting and page fetching
 */
export const composeCriteriaPredicate = (criteria: SearchCriteria): Predicate<Product> => {
  const predicates: Predicate<Product>[] = [
    statusPredicate(criteria.status),
    searchTextPredicate(criteria.searchText),
  ];

  if (hasText(criteria.category)) predicates.push(categoryPredicate(criteria.category));
  if (hasText(criteria.brand)) predicates.push(equals(p => p.brand, criteria.brand));
  if (hasText(criteria.material)) predicates.push(equals(p => p.material, criteria.material));
  if (hasText(criteria.color)) predicates.push(equals(p => p.color, criteria.color));

  if (hasText(criteria.eanCode)) {
    const eanCode = criteria.eanCode;
    predicates.push(product => (product.ean_code ?? '').includes(eanCode));
  }

  predicates.push(
    range(p => p.weight, criteria.minWeight, criteria.maxWeight),
    range(p => p.desi, criteria.minDesi, criteria.maxDesi),
    range(p => p.warranty_months, criteria.minWarranty, criteria.maxWarranty),
    triState(criteria.hasImage, anyImageFilled),
    triState(criteria.hasEan, fieldFilled<Product>(p => p.ean_code)),
    triState(criteria.hasBarcode, anyBarcodeFilled)
  );

  if (hasText(criteria.barcodeType)) {
    // Unknown tags leave the result untouched
    const barcodeType = barcodeTypePredicate(criteria.barcodeType);
    if (barcodeType) predicates.push(barcodeType);
  }

  return and(...predicates);
};
