import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
        name VARCHAR(500) NOT NULL,
        sku VARCHAR(100) NOT NULL DEFAULT '',
        brand VARCHAR(200),
        -- legacy free-text category, still filled by older imports
        category VARCHAR(200),
        ean_code VARCHAR(100),
        description VARCHAR(2000),
        features VARCHAR(2000),
        notes TEXT,
        material VARCHAR(200),
        color VARCHAR(200),
        -- NUMERIC comes back from pg as a string, see products.repository
        weight NUMERIC(10, 2) NOT NULL DEFAULT 0 CHECK (weight >= 0),
        desi NUMERIC(10, 2) NOT NULL DEFAULT 0 CHECK (desi >= 0),
        width NUMERIC(10, 2) NOT NULL DEFAULT 0 CHECK (width >= 0),
        height NUMERIC(10, 2) NOT NULL DEFAULT 0 CHECK (height >= 0),
        depth NUMERIC(10, 2) NOT NULL DEFAULT 0 CHECK (depth >= 0),
        warranty_months INTEGER NOT NULL DEFAULT 0 CHECK (warranty_months >= 0),
        image_url VARCHAR(1000),
        image_url_1 VARCHAR(1000),
        image_url_2 VARCHAR(1000),
        image_url_3 VARCHAR(1000),
        image_url_4 VARCHAR(1000),
        image_url_5 VARCHAR(1000),
        trendyol_barcode VARCHAR(100),
        hepsiburada_barcode VARCHAR(100),
        hepsiburada_seller_stock_code VARCHAR(100),
        hepsiburada_tedarik_barcode VARCHAR(100),
        amazon_barcode VARCHAR(100),
        koctas_barcode VARCHAR(100),
        koctas_istanbul_barcode VARCHAR(100),
        koctas_ean_barcode VARCHAR(100),
        koctas_ean_istanbul_barcode VARCHAR(100),
        n11_catalog_id VARCHAR(100),
        n11_product_code VARCHAR(100),
        pazarama_barcode VARCHAR(100),
        pttavm_barcode VARCHAR(100),
        ptt_urun_stok_kodu VARCHAR(100),
        haceyapi_barcode VARCHAR(100),
        spare_barcode_1 VARCHAR(100),
        spare_barcode_2 VARCHAR(100),
        spare_barcode_3 VARCHAR(100),
        spare_barcode_4 VARCHAR(100),
        logo_barcodes TEXT,
        is_archived BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_products_category ON products(category_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_products_archived ON products(is_archived)');
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_products_archived');
    await client.query('DROP INDEX IF EXISTS idx_products_category');
    await client.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
