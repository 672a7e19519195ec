import type { SearchResults } from '@domain/types/search.js';
import type { ServiceCallOptions, ServiceResult } from './reasoning-service.js';

/**
 * Port interface for web search. Zero hits is a normal answer, not an error.
 */
export interface ISearchService {
  readonly name: string;
  search(query: string, maxResults: number, options: ServiceCallOptions): Promise<ServiceResult<SearchResults>>;
}
