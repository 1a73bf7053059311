import { Product } from '../../connections/db/models/product.model';
import { knownBarcodeTypes } from '../search/barcode.fields';

export interface FilterOptions {
  categories: string[];
  brands: string[];
  materials: string[];
  colors: string[];
  barcodeTypes: string[];
}

export interface CatalogStats {
  totalProducts: number;
  activeProducts: number;
  archivedProducts: number;
  totalCategories: number;
}

const distinctSorted = (values: Array<string | null | undefined>): string[] =>
  [...new Set(values.filter((value): value is string => !!value))].sort();

/**
 * Dropdown values for the advanced search form. Categories merge the legacy
 * free-text column with linked category names.
 */
export const collectFilterOptions = (products: readonly Product[]): FilterOptions => ({
  categories: distinctSorted(products.flatMap(p => [p.category, p.category_name])),
  brands: distinctSorted(products.map(p => p.brand)),
  materials: distinctSorted(products.map(p => p.material)),
  colors: distinctSorted(products.map(p => p.color)),
  barcodeTypes: knownBarcodeTypes(),
});

export const collectCatalogStats = (products: readonly Product[], totalCategories: number): CatalogStats => {
  const archivedProducts = products.filter(p => p.is_archived).length;

  return {
    totalProducts: products.length,
    activeProducts: products.length - archivedProducts,
    archivedProducts,
    totalCategories,
  };
};
