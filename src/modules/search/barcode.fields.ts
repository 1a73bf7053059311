import {
  MARKETPLACE_BARCODE_FIELDS,
  MarketplaceBarcodeField,
  Product,
} from '../../connections/db/models/product.model';
import { Predicate, fieldFilled, or } from './predicate';

export const ANY_BARCODE_TYPE = 'any';

// barcodeType tag -> barcode columns it checks (n11 covers both of its identifiers)
export const BARCODE_TYPE_FIELDS: ReadonlyMap<string, readonly MarketplaceBarcodeField[]> = new Map<string, readonly MarketplaceBarcodeField[]>([
  ['trendyol', ['trendyol_barcode']],
  ['hepsiburada', ['hepsiburada_barcode']],
  ['hepsiburada_seller', ['hepsiburada_seller_stock_code']],
  ['hepsiburada_tedarik', ['hepsiburada_tedarik_barcode']],
  ['amazon', ['amazon_barcode']],
  ['koctas', ['koctas_barcode']],
  ['koctas_istanbul', ['koctas_istanbul_barcode']],
  ['koctas_ean', ['koctas_ean_barcode']],
  ['koctas_ean_istanbul', ['koctas_ean_istanbul_barcode']],
  ['n11', ['n11_product_code', 'n11_catalog_id']],
  ['n11_catalog', ['n11_catalog_id']],
  ['n11_product', ['n11_product_code']],
  ['pazarama', ['pazarama_barcode']],
  ['pttavm', ['pttavm_barcode']],
  ['ptt_urun_stok', ['ptt_urun_stok_kodu']],
  ['haceyapi', ['haceyapi_barcode']],
  ['spare1', ['spare_barcode_1']],
  ['spare2', ['spare_barcode_2']],
  ['spare3', ['spare_barcode_3']],
  ['spare4', ['spare_barcode_4']],
  ['logo', ['logo_barcodes']],
]);

export const barcodeFilled = (field: MarketplaceBarcodeField): Predicate<Product> =>
  fieldFilled<Product>(product => product[field]);

/**
 * True when at least one marketplace barcode is set
 */
export const anyBarcodeFilled: Predicate<Product> = or(...MARKETPLACE_BARCODE_FIELDS.map(barcodeFilled));

/**
 * Predicate for a barcodeType tag, or undefined when the tag is unknown
 */
export const barcodeTypePredicate = (barcodeType: string): Predicate<Product> | undefined => {
  const tag = barcodeType.trim().toLowerCase();
  if (tag === ANY_BARCODE_TYPE) {
    return anyBarcodeFilled;
  }

  const fields = BARCODE_TYPE_FIELDS.get(tag);
  return fields ? or(...fields.map(barcodeFilled)) : undefined;
};

export const knownBarcodeTypes = (): string[] => [...BARCODE_TYPE_FIELDS.keys(), ANY_BARCODE_TYPE];
