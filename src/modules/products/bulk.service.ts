import { getLogger } from '../../utils/logging';
import { ProductService } from './products.service';

export type BulkAction = 'archive' | 'unarchive' | 'delete';

export interface BulkResult {
  successCount: number;
  failCount: number;
}

const log = getLogger('BulkService');

/**
 * Applies one action to many products, each id on its own. Missing ids, ids
 * already in the target state and storage faults count as failures; the
 * batch is never aborted and is not atomic.
 */
export class BulkService {
  constructor(private readonly products: ProductService) {}

  async apply(action: BulkAction, productIds: readonly number[]): Promise<BulkResult> {
    const startedAt = Date.now();
    const result: BulkResult = { successCount: 0, failCount: 0 };

    for (const productId of productIds) {
      const succeeded = await this.applyOne(action, productId);
      if (succeeded) {
        result.successCount++;
      } else {
        result.failCount++;
      }
    }

    log.info(`Bulk ${action} completed`, {
      requested: productIds.length,
      ...result,
      elapsedMs: Date.now() - startedAt,
    });

    return result;
  }

  private async applyOne(action: BulkAction, productId: number): Promise<boolean> {
    try {
      if (action === 'delete') {
        const deleted = await this.products.remove(productId);
        if (!deleted) log.warn('Bulk delete: product not found', { productId });
        return deleted;
      }

      const outcome = await this.products.setArchived(productId, action === 'archive');
      if (outcome.status !== 'updated') {
        log.warn(`Bulk ${action}: product ${outcome.status === 'not_found' ? 'not found' : 'already in target state'}`, {
          productId,
        });
      }
      return outcome.status === 'updated';
    } catch (error) {
      log.error(`Bulk ${action} failed for product`, {
        productId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
