import { searchConfig } from '../../connections/config/app.config';
import { getLogger } from '../../utils/logging';
import { normalizeSearchTerm } from './normalize';
import { ProductSearchService } from './search.service';
import { Suggestion, SuggestionType } from './search.types';

const log = getLogger('SuggestionService');

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Wraps every case-insensitive occurrence of the query in <mark>
 */
export const highlightMatch = (text: string, query: string): string => {
  if (!text || !query) return text;
  return text.replace(new RegExp(escapeRegExp(query), 'gi'), match => `<mark>${match}</mark>`);
};

export class SuggestionService {
  constructor(private readonly searchService: ProductSearchService) {}

  async suggest(query: string | undefined): Promise<Suggestion[]> {
    const trimmed = (query ?? '').trim();
    if (trimmed.length < searchConfig.suggestionMinQueryLength) {
      return [];
    }

    try {
      const { items } = await this.searchService.search({
        searchText: trimmed,
        page: 1,
        pageSize: searchConfig.suggestionSearchPageSize,
      });

      const normalizedQuery = normalizeSearchTerm(trimmed);
      const emitted = new Set<string>();
      const suggestions: Suggestion[] = [];

      const consider = (value: string | null, type: SuggestionType) => {
        if (!value || suggestions.length >= searchConfig.suggestionLimit) return;

        const key = value.toLowerCase();
        if (emitted.has(key) || !normalizeSearchTerm(value).includes(normalizedQuery)) return;

        emitted.add(key);
        suggestions.push({ text: value, type, highlight: highlightMatch(value, trimmed) });
      };

      for (const product of items) {
        consider(product.name, 'product');
        consider(product.brand, 'brand');
        if (suggestions.length >= searchConfig.suggestionLimit) break;
      }

      return suggestions;
    } catch (error) {
      log.error('Failed to build search suggestions', {
        query: trimmed,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}
