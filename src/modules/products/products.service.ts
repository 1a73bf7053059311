import { Product, ProductFields } from '../../connections/db/models/product.model';
import { getLogger } from '../../utils/logging';
import { ProductRepository, UniqueProductField } from './products.repository';

export type ArchiveOutcome =
  | { status: 'not_found' }
  | { status: 'unchanged'; product: Product }
  | { status: 'updated'; product: Product };

const log = getLogger('ProductService');

/**
 * Single-record lifecycle: create, edit, archive toggle and delete.
 * Every accepted change stamps updated_at; creation leaves it empty.
 */
export class ProductService {
  constructor(
    private readonly repository: ProductRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  findById(id: number): Promise<Product | null> {
    return this.repository.findById(id);
  }

  async create(fields: ProductFields): Promise<Product> {
    const product = await this.repository.create({
      ...fields,
      is_archived: false,
      created_at: this.now(),
      updated_at: null,
    });

    log.info('Product created', { productId: product.id, name: product.name });
    return product;
  }

  /** Resolves null when the product does not exist */
  async update(id: number, fields: ProductFields): Promise<Product | null> {
    const existing = await this.repository.findById(id);
    if (!existing) return null;

    const product = await this.repository.save({
      ...existing,
      ...fields,
      id,
      updated_at: this.now(),
    });

    log.info('Product updated', { productId: id });
    return product;
  }

  async setArchived(id: number, archived: boolean): Promise<ArchiveOutcome> {
    const existing = await this.repository.findById(id);
    if (!existing) return { status: 'not_found' };
    if (existing.is_archived === archived) return { status: 'unchanged', product: existing };

    const product = await this.repository.save({ ...existing, is_archived: archived, updated_at: this.now() });
    return { status: 'updated', product };
  }

  /** Resolves false when the product does not exist */
  async remove(id: number): Promise<boolean> {
    const existing = await this.repository.findById(id);
    if (!existing) return false;

    return this.repository.delete(id);
  }

  /** Blank values never collide */
  async isUnique(field: UniqueProductField, value: string | null | undefined, excludeId?: number): Promise<boolean> {
    const trimmed = (value ?? '').trim();
    if (trimmed.length === 0) return true;

    return !(await this.repository.existsWith(field, trimmed, excludeId));
  }

  /**
   * Fields of a create/edit payload already used by another product
   */
  async duplicateFields(fields: ProductFields, excludeId?: number): Promise<UniqueProductField[]> {
    const duplicates: UniqueProductField[] = [];
    if (!(await this.isUnique('sku', fields.sku, excludeId))) duplicates.push('sku');
    if (!(await this.isUnique('ean_code', fields.ean_code, excludeId))) duplicates.push('ean_code');
    return duplicates;
  }
}
