// Product Model - mirrors the products table (see migrations)

export interface Product {
  id: number;
  category_id: number | null;
  category_name?: string | null; // joined from categories, not a column
  name: string;
  sku: string;
  brand: string | null;
  category: string | null; // legacy free-text category, kept alongside category_id
  ean_code: string | null;
  description: string | null;
  features: string | null;
  notes: string | null;
  material: string | null;
  color: string | null;
  weight: number;
  desi: number;
  width: number;
  height: number;
  depth: number;
  warranty_months: number;

  // Images
  image_url: string | null;
  image_url_1: string | null;
  image_url_2: string | null;
  image_url_3: string | null;
  image_url_4: string | null;
  image_url_5: string | null;

  // Marketplace barcodes
  trendyol_barcode: string | null;
  hepsiburada_barcode: string | null;
  hepsiburada_seller_stock_code: string | null;
  hepsiburada_tedarik_barcode: string | null;
  amazon_barcode: string | null;
  koctas_barcode: string | null;
  koctas_istanbul_barcode: string | null;
  koctas_ean_barcode: string | null;
  koctas_ean_istanbul_barcode: string | null;
  n11_catalog_id: string | null;
  n11_product_code: string | null;
  pazarama_barcode: string | null;
  pttavm_barcode: string | null;
  ptt_urun_stok_kodu: string | null;
  haceyapi_barcode: string | null;
  spare_barcode_1: string | null;
  spare_barcode_2: string | null;
  spare_barcode_3: string | null;
  spare_barcode_4: string | null;
  logo_barcodes: string | null; // comma separated, see utils/logo-barcodes

  is_archived: boolean; // default: false
  created_at: Date;
  updated_at: Date | null;
}

export type ProductColumn = Exclude<keyof Product, 'id' | 'category_name'>;

// Row as inserted; id is assigned by the database
export type NewProduct = Omit<Product, 'id' | 'category_name'>;

// Fields a caller may set on create and edit
export type ProductFields = Omit<NewProduct, 'is_archived' | 'created_at' | 'updated_at'>;

export const IMAGE_URL_FIELDS = [
  'image_url',
  'image_url_1',
  'image_url_2',
  'image_url_3',
  'image_url_4',
  'image_url_5',
] as const satisfies readonly ProductColumn[];

export const MARKETPLACE_BARCODE_FIELDS = [
  'trendyol_barcode',
  'hepsiburada_barcode',
  'hepsiburada_seller_stock_code',
  'hepsiburada_tedarik_barcode',
  'amazon_barcode',
  'koctas_barcode',
  'koctas_istanbul_barcode',
  'koctas_ean_barcode',
  'koctas_ean_istanbul_barcode',
  'n11_catalog_id',
  'n11_product_code',
  'pazarama_barcode',
  'pttavm_barcode',
  'ptt_urun_stok_kodu',
  'haceyapi_barcode',
  'spare_barcode_1',
  'spare_barcode_2',
  'spare_barcode_3',
  'spare_barcode_4',
  'logo_barcodes',
] as const satisfies readonly ProductColumn[];

export type MarketplaceBarcodeField = (typeof MARKETPLACE_BARCODE_FIELDS)[number];

// Every persisted column except id, in insert/update order
export const PRODUCT_COLUMNS = [
  'category_id',
  'name',
  'sku',
  'brand',
  'category',
  'ean_code',
  'description',
  'features',
  'notes',
  'material',
  'color',
  'weight',
  'desi',
  'width',
  'height',
  'depth',
  'warranty_months',
  ...IMAGE_URL_FIELDS,
  ...MARKETPLACE_BARCODE_FIELDS,
  'is_archived',
  'created_at',
  'updated_at',
] as const satisfies readonly ProductColumn[];
