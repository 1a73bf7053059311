import { z } from 'zod';
import { searchConfig } from '../../connections/config/app.config';
import { blankToUndefined, nullableText } from '../../utils/validation';

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const optionalAmount = z.preprocess(blankToUndefined, z.coerce.number().nonnegative().optional());

const optionalMonths = z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional());

const optionalFlag = z.preprocess(value => {
  const normalized = blankToUndefined(value);
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return normalized;
}, z.boolean().optional());

const lowerCased = (value: unknown) =>
  typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value;

// Advanced search criteria (GET /products/search)
export const criteriaQuerySchema = z.object({
  searchText: optionalText,
  category: optionalText,
  brand: optionalText,
  status: z.preprocess(lowerCased, z.enum(['active', 'archived', 'all']).optional()),
  material: optionalText,
  color: optionalText,
  eanCode: optionalText,
  minWeight: optionalAmount,
  maxWeight: optionalAmount,
  minDesi: optionalAmount,
  maxDesi: optionalAmount,
  minWarranty: optionalMonths,
  maxWarranty: optionalMonths,
  sortBy: optionalText,
  sortDirection: z.preprocess(lowerCased, z.enum(['asc', 'desc']).optional()),
  hasImage: optionalFlag,
  hasEan: optionalFlag,
  hasBarcode: optionalFlag,
  barcodeType: optionalText,
  page: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1, 'Page must be at least 1').default(searchConfig.defaultPage)
  ),
  pageSize: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int()
      .min(1, 'Page size must be at least 1')
      .default(searchConfig.defaultPageSize)
      .transform(size => Math.min(size, searchConfig.maxPageSize))
  ),
});

// Bulk archive / unarchive / delete (POST /products/bulk)
export const bulkRequestSchema = z.object({
  action: z
    .string()
    .trim()
    .transform(action => action.toLowerCase())
    .pipe(z.enum(['archive', 'unarchive', 'delete'])),
  productIds: z
    .array(z.number().int())
    .min(1, 'No products selected')
    .max(searchConfig.bulkMaxIds, `At most ${searchConfig.bulkMaxIds} products can be processed at once`),
});

export const suggestQuerySchema = z.object({
  query: z.string().optional().default(''),
});

const amount = z.coerce.number().nonnegative().default(0);
const barcode = nullableText(100);
const imageUrl = nullableText(1000);

// Create / edit body (POST /products, PUT /products/:id)
export const productBodySchema = z.object({
  category_id: z.preprocess(
    value => (value === undefined || value === '' ? null : value),
    z.coerce.number().int().positive().nullable()
  ),
  name: z.string().trim().min(1, 'Product name is required').max(500),
  sku: z.string().trim().max(100).default(''),
  brand: nullableText(200),
  category: nullableText(200),
  ean_code: nullableText(100),
  description: nullableText(2000),
  features: nullableText(2000),
  notes: nullableText(),
  material: nullableText(200),
  color: nullableText(200),
  weight: amount,
  desi: amount,
  width: amount,
  height: amount,
  depth: amount,
  warranty_months: z.coerce.number().int().nonnegative().default(0),
  image_url: imageUrl,
  image_url_1: imageUrl,
  image_url_2: imageUrl,
  image_url_3: imageUrl,
  image_url_4: imageUrl,
  image_url_5: imageUrl,
  trendyol_barcode: barcode,
  hepsiburada_barcode: barcode,
  hepsiburada_seller_stock_code: barcode,
  hepsiburada_tedarik_barcode: barcode,
  amazon_barcode: barcode,
  koctas_barcode: barcode,
  koctas_istanbul_barcode: barcode,
  koctas_ean_barcode: barcode,
  koctas_ean_istanbul_barcode: barcode,
  n11_catalog_id: barcode,
  n11_product_code: barcode,
  pazarama_barcode: barcode,
  pttavm_barcode: barcode,
  ptt_urun_stok_kodu: barcode,
  haceyapi_barcode: barcode,
  spare_barcode_1: barcode,
  spare_barcode_2: barcode,
  spare_barcode_3: barcode,
  spare_barcode_4: barcode,
  logo_barcodes: nullableText(),
});

// Uniqueness checks used while a form is being filled in
export const skuCheckSchema = z.object({
  sku: z.string().default(''),
  excludeProductId: z.number().int().optional(),
});

export const eanCheckSchema = z.object({
  eanCode: z.string().default(''),
  excludeProductId: z.number().int().optional(),
});
