import { Pool } from 'pg';
import { Category, CategoryFields } from '../../connections/db/models/category.model';

export interface CategoryRepository {
  /** Active categories ordered by name */
  findActive(): Promise<Category[]>;
  findById(id: number): Promise<Category | null>;
  /** Case-insensitive lookup */
  findByName(name: string): Promise<Category | null>;
  count(): Promise<number>;
  create(fields: CategoryFields): Promise<Category>;
  /** Resolves null when the category does not exist */
  update(id: number, fields: CategoryFields): Promise<Category | null>;
  delete(id: number): Promise<boolean>;
  countProducts(id: number): Promise<number>;
}

const CATEGORY_COLUMNS = 'id, name, description, is_active, created_at, updated_at';

export class PgCategoryRepository implements CategoryRepository {
  constructor(private readonly pool: Pool) {}

  async findActive(): Promise<Category[]> {
    const result = await this.pool.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE is_active = TRUE ORDER BY name ASC`
    );
    return result.rows;
  }

  async findById(id: number): Promise<Category | null> {
    const result = await this.pool.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findByName(name: string): Promise<Category | null> {
    const result = await this.pool.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE LOWER(name) = LOWER($1)`,
      [name]
    );
    return result.rows[0] ?? null;
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM categories');
    return parseInt(result.rows[0].count, 10);
  }

  async create(fields: CategoryFields): Promise<Category> {
    const result = await this.pool.query<Category>(
      `INSERT INTO categories (name, description, is_active)
       VALUES ($1, $2, COALESCE($3, TRUE))
       RETURNING ${CATEGORY_COLUMNS}`,
      [fields.name, fields.description, fields.is_active ?? null]
    );
    return result.rows[0];
  }

  async update(id: number, fields: CategoryFields): Promise<Category | null> {
    const result = await this.pool.query<Category>(
      `UPDATE categories
       SET name = $2, description = $3, is_active = COALESCE($4, is_active), updated_at = NOW()
       WHERE id = $1
       RETURNING ${CATEGORY_COLUMNS}`,
      [id, fields.name, fields.description, fields.is_active ?? null]
    );
    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM categories WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async countProducts(id: number): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM products WHERE category_id = $1',
      [id]
    );
    return parseInt(result.rows[0].count, 10);
  }
}
