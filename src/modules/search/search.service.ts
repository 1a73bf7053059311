import { searchConfig } from '../../connections/config/app.config';
import { getLogger } from '../../utils/logging';
import { ProductRepository } from '../products/products.repository';
import { composeCriteriaPredicate } from './criteria.predicate';
import { paginate, totalPages } from './paginator';
import { sortProducts } from './sorter';
import { SearchCriteria, SearchResult } from './search.types';

const log = getLogger('ProductSearchService');

export class ProductSearchService {
  constructor(private readonly repository: ProductRepository) {}

  /**
   * Filters one snapshot of the catalog with a single predicate; the total
   * count is taken before sorting and slicing.
   */
  async search(criteria: SearchCriteria): Promise<SearchResult> {
    const page = criteria.page ?? searchConfig.defaultPage;
    const pageSize = criteria.pageSize ?? searchConfig.defaultPageSize;
    const startedAt = Date.now();

    const predicate = composeCriteriaPredicate(criteria);
    const products = await this.repository.fetchAll();
    const matched = products.filter(predicate);
    const totalCount = matched.length;

    const items = paginate(sortProducts(matched, criteria.sortBy, criteria.sortDirection), page, pageSize);

    log.debug('Product search completed', {
      totalCount,
      returned: items.length,
      page,
      pageSize,
      elapsedMs: Date.now() - startedAt,
    });

    return {
      items,
      totalCount,
      page,
      pageSize,
      totalPages: totalPages(totalCount, pageSize),
    };
  }

  async count(criteria: SearchCriteria): Promise<number> {
    const predicate = composeCriteriaPredicate(criteria);
    const products = await this.repository.fetchAll();
    return products.filter(predicate).length;
  }
}
