import { describe, it, expect } from '@jest/globals';
import { Product } from '../../../src/connections/db/models/product.model';
import { ProductSearchService } from '../../../src/modules/search/search.service';
import { SuggestionService, highlightMatch } from '../../../src/modules/search/suggestion.service';
import { InMemoryProductRepository, makeProduct } from '../../helpers/products';

const day = (d: number) => new Date(Date.UTC(2025, 0, d));

const suggestionsFor = (products: Product[]) =>
  new SuggestionService(new ProductSearchService(new InMemoryProductRepository(products)));

describe('highlightMatch', () => {
  it('wraps every case-insensitive occurrence', () => {
    expect(highlightMatch('Klozet klapa', 'kl')).toBe('<mark>Kl</mark>ozet <mark>kl</mark>apa');
  });

  it('treats the query literally', () => {
    expect(highlightMatch('Set (2 li) + kapak', '(2 li)')).toBe('Set <mark>(2 li)</mark> + kapak');
  });
});

describe('SuggestionService', () => {
  const klozets = [
    makeProduct({ id: 1, name: 'Klozet A', brand: 'Vitra', created_at: day(1) }),
    makeProduct({ id: 2, name: 'Klozet B', brand: 'Ece', created_at: day(2) }),
    makeProduct({ id: 3, name: 'Lavabo', brand: 'Vitra', created_at: day(3) }),
  ];

  it('suggests matching product names in search order', async () => {
    const suggestions = await suggestionsFor(klozets).suggest('kl');

    expect(suggestions).toEqual([
      { text: 'Klozet B', type: 'product', highlight: '<mark>Kl</mark>ozet B' },
      { text: 'Klozet A', type: 'product', highlight: '<mark>Kl</mark>ozet A' },
    ]);
  });

  it('returns nothing for queries shorter than two characters', async () => {
    const service = suggestionsFor(klozets);

    expect(await service.suggest('k')).toEqual([]);
    expect(await service.suggest('  k  ')).toEqual([]);
    expect(await service.suggest(undefined)).toEqual([]);
  });

  it('suggests brands', async () => {
    const suggestions = await suggestionsFor([
      makeProduct({ id: 1, name: 'Banyo Dolabı', brand: 'Kale' }),
    ]).suggest('kale');

    expect(suggestions).toEqual([{ text: 'Kale', type: 'brand', highlight: '<mark>Kale</mark>' }]);
  });

  it('emits each value once regardless of case', async () => {
    const suggestions = await suggestionsFor([
      makeProduct({ id: 1, name: 'Klozet', created_at: day(2) }),
      makeProduct({ id: 2, name: 'KLOZET', created_at: day(1) }),
    ]).suggest('klo');

    expect(suggestions.map(s => s.text)).toEqual(['Klozet']);
  });

  it('matches Turkish letters loosely but highlights literally', async () => {
    const suggestions = await suggestionsFor([
      makeProduct({ id: 1, name: 'Çamaşır Askısı' }),
    ]).suggest('camasir');

    expect(suggestions).toEqual([{ text: 'Çamaşır Askısı', type: 'product', highlight: 'Çamaşır Askısı' }]);
  });

  it('stops at eight suggestions', async () => {
    const products = Array.from({ length: 12 }, (_, i) => makeProduct({ id: i + 1, name: `Klozet ${i + 1}` }));

    expect(await suggestionsFor(products).suggest('klozet')).toHaveLength(8);
  });

  it('degrades to an empty list when the search fails', async () => {
    const repository = new InMemoryProductRepository();
    repository.fetchAll = async () => {
      throw new Error('connection refused');
    };

    const service = new SuggestionService(new ProductSearchService(repository));
    expect(await service.suggest('klozet')).toEqual([]);
  });
});
