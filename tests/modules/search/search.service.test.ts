import { describe, it, expect, beforeEach } from '@jest/globals';
import { BulkService } from '../../../src/modules/products/bulk.service';
import { ProductService } from '../../../src/modules/products/products.service';
import { ProductSearchService } from '../../../src/modules/search/search.service';
import { SearchCriteria } from '../../../src/modules/search/search.types';
import { InMemoryProductRepository, makeProduct } from '../../helpers/products';

const day = (d: number) => new Date(Date.UTC(2025, 0, d));

describe('ProductSearchService', () => {
  describe('klozet / lavabo catalog', () => {
    let service: ProductSearchService;

    beforeEach(() => {
      service = new ProductSearchService(
        new InMemoryProductRepository([
          makeProduct({ id: 1, name: 'Klozet A', created_at: day(1) }),
          makeProduct({ id: 2, name: 'Klozet B', created_at: day(2) }),
          makeProduct({ id: 3, name: 'Lavabo', created_at: day(3), is_archived: true }),
        ])
      );
    });

    it('finds both klozets by name', async () => {
      const result = await service.search({ searchText: 'klozet', sortBy: 'name', sortDirection: 'asc' });

      expect(result.items.map(p => p.name)).toEqual(['Klozet A', 'Klozet B']);
      expect(result.totalCount).toBe(2);
      expect(result.totalPages).toBe(1);
    });

    it('lists the most recently touched product first by default', async () => {
      const result = await service.search({ searchText: 'klozet' });

      expect(result.items.map(p => p.id)).toEqual([2, 1]);
    });

    it('hides archived products unless asked for', async () => {
      expect((await service.search({ searchText: 'lavabo' })).totalCount).toBe(0);

      const archived = await service.search({ searchText: 'lavabo', status: 'archived' });
      expect(archived.items.map(p => p.id)).toEqual([3]);
    });

    it('fills in default paging', async () => {
      const result = await service.search({});

      expect(result.page).toBe(1);
      expect(result.pageSize).toBe(50);
      expect(result.totalCount).toBe(2);
    });
  });

  describe('paging', () => {
    const criteria: SearchCriteria = { sortBy: 'name', sortDirection: 'asc' };
    let service: ProductSearchService;

    beforeEach(() => {
      const active = Array.from({ length: 7 }, (_, i) =>
        makeProduct({ id: 100 + i, name: `Batarya ${String.fromCharCode(71 - i)}` })
      );
      const archived = [
        makeProduct({ id: 200, name: 'Batarya Z', is_archived: true }),
        makeProduct({ id: 201, name: 'Batarya Y', is_archived: true }),
      ];
      service = new ProductSearchService(new InMemoryProductRepository([...active, ...archived]));
    });

    it('counts the full unpaginated result', async () => {
      const full = await service.search({ ...criteria, pageSize: 200 });
      const firstPage = await service.search({ ...criteria, page: 1, pageSize: 3 });

      expect(full.items).toHaveLength(7);
      expect(firstPage.totalCount).toBe(7);
      expect(await service.count(criteria)).toBe(7);
      expect(firstPage.totalPages).toBe(3);
    });

    it('returns disjoint pages that concatenate to the full order', async () => {
      const full = await service.search({ ...criteria, pageSize: 200 });
      const pages = await Promise.all(
        [1, 2, 3].map(page => service.search({ ...criteria, page, pageSize: 3 }))
      );

      expect(pages.map(p => p.items.length)).toEqual([3, 3, 1]);
      expect(pages.flatMap(p => p.items.map(item => item.id))).toEqual(full.items.map(item => item.id));
      expect(full.items[0].name).toBe('Batarya A');
    });

    it('returns an empty page past the end, with the same count', async () => {
      const result = await service.search({ ...criteria, page: 4, pageSize: 3 });

      expect(result.items).toEqual([]);
      expect(result.totalCount).toBe(7);
    });
  });

  it('sees the archive flag set by a bulk archive', async () => {
    const repository = new InMemoryProductRepository([
      makeProduct({ id: 1, name: 'Armatur' }),
      makeProduct({ id: 2, name: 'Batarya' }),
      makeProduct({ id: 3, name: 'Cop Kovasi' }),
    ]);
    const service = new ProductSearchService(repository);

    await new BulkService(new ProductService(repository)).apply('archive', [1]);

    const archived = await service.search({ status: 'archived' });
    const active = await service.search({ status: 'active', sortBy: 'name', sortDirection: 'asc' });

    expect(archived.items.map(p => p.id)).toEqual([1]);
    expect(active.items.map(p => p.id)).toEqual([2, 3]);
    expect(active.totalCount).toBe(2);
  });

  it('propagates storage faults', async () => {
    const repository = new InMemoryProductRepository();
    repository.fetchAll = async () => {
      throw new Error('connection refused');
    };

    await expect(new ProductSearchService(repository).search({})).rejects.toThrow('connection refused');
  });
});
