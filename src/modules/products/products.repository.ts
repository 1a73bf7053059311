import { Pool } from 'pg';
import { NewProduct, PRODUCT_COLUMNS, Product } from '../../connections/db/models/product.model';

/**
 * Storage collaborator used by search and bulk operations
 */
export interface ProductRepository {
  fetchAll(): Promise<Product[]>;
  findById(id: number): Promise<Product | null>;
  create(product: NewProduct): Promise<Product>;
  /** Persists every column of an existing product */
  save(product: Product): Promise<Product>;
  /** Resolves false when no row had that id */
  delete(id: number): Promise<boolean>;
  /** Whether another product already uses this value */
  existsWith(field: UniqueProductField, value: string, excludeId?: number): Promise<boolean>;
}

export type UniqueProductField = 'sku' | 'ean_code';

type DecimalColumn = 'weight' | 'desi' | 'width' | 'height' | 'depth';

// NUMERIC columns come back from pg as strings
type ProductRow = Omit<Product, DecimalColumn> & Record<DecimalColumn, string | number>;

export const mapProductRow = (row: ProductRow): Product => ({
  ...row,
  weight: Number(row.weight),
  desi: Number(row.desi),
  width: Number(row.width),
  height: Number(row.height),
  depth: Number(row.depth),
});

const SELECT_PRODUCTS =
  'SELECT p.*, c.name AS category_name FROM products p LEFT JOIN categories c ON p.category_id = c.id';

export class PgProductRepository implements ProductRepository {
  constructor(private readonly pool: Pool) {}

  async fetchAll(): Promise<Product[]> {
    const result = await this.pool.query<ProductRow>(SELECT_PRODUCTS);
    return result.rows.map(mapProductRow);
  }

  async findById(id: number): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(`${SELECT_PRODUCTS} WHERE p.id = $1`, [id]);
    return result.rows.length > 0 ? mapProductRow(result.rows[0]) : null;
  }

  async create(product: NewProduct): Promise<Product> {
    const placeholders = PRODUCT_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');
    const params = PRODUCT_COLUMNS.map(column => product[column]);

    const result = await this.pool.query<ProductRow>(
      `WITH inserted AS (
         INSERT INTO products (${PRODUCT_COLUMNS.join(', ')}) VALUES (${placeholders}) RETURNING *
       )
       SELECT i.*, c.name AS category_name FROM inserted i LEFT JOIN categories c ON i.category_id = c.id`,
      params
    );

    return mapProductRow(result.rows[0]);
  }

  async save(product: Product): Promise<Product> {
    const assignments = PRODUCT_COLUMNS.map((column, index) => `${column} = $${index + 2}`).join(', ');
    const params = [product.id, ...PRODUCT_COLUMNS.map(column => product[column])];

    const result = await this.pool.query<ProductRow>(
      `WITH updated AS (
         UPDATE products SET ${assignments} WHERE id = $1 RETURNING *
       )
       SELECT u.*, c.name AS category_name FROM updated u LEFT JOIN categories c ON u.category_id = c.id`,
      params
    );

    if (result.rows.length === 0) {
      throw new Error(`Product ${product.id} does not exist`);
    }

    return mapProductRow(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM products WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async existsWith(field: UniqueProductField, value: string, excludeId?: number): Promise<boolean> {
    // field is one of two literal column names, never caller text
    const result = await this.pool.query(
      `SELECT 1 FROM products WHERE ${field} = $1 AND ($2::int IS NULL OR id <> $2) LIMIT 1`,
      [value, excludeId ?? null]
    );
    return result.rows.length > 0;
  }
}
