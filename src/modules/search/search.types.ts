import { Product } from '../../connections/db/models/product.model';

export type ProductStatus = 'active' | 'archived' | 'all';

export type SortKey =
  | 'name'
  | 'brand'
  | 'category'
  | 'sku'
  | 'weight'
  | 'desi'
  | 'warranty'
  | 'created'
  | 'updated';

export type SortDirection = 'asc' | 'desc';

/**
 * Every caller-supplied filter, sort and paging parameter of one query.
 * Absent or blank values never narrow the result.
 */
export interface SearchCriteria {
  searchText?: string;
  category?: string;
  brand?: string;
  status?: ProductStatus;
  material?: string;
  color?: string;
  eanCode?: string;
  minWeight?: number;
  maxWeight?: number;
  minDesi?: number;
  maxDesi?: number;
  minWarranty?: number;
  maxWarranty?: number;
  sortBy?: string; // unknown keys fall back to name ascending
  sortDirection?: SortDirection;
  hasImage?: boolean;
  hasEan?: boolean;
  hasBarcode?: boolean;
  barcodeType?: string;
  page?: number;
  pageSize?: number;
}

export interface SearchResult {
  items: Product[];
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export type SuggestionType = 'product' | 'brand';

export interface Suggestion {
  text: string;
  type: SuggestionType;
  highlight: string;
}
