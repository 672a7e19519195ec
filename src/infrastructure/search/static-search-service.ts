import type { ISearchService } from '@domain/ports/search-service.js';
import type { ServiceCallOptions, ServiceError, ServiceResult } from '@domain/ports/reasoning-service.js';
import type { SearchHit, SearchResults } from '@domain/types/search.js';
import { err, ok } from '@shared/lib/result.js';

export interface StaticSearchOptions {
  hits?: SearchHit[];
  answer?: string;
  /** Answer every query with this error instead. */
  failWith?: ServiceError;
}

/**
 * ISearchService over a fixed list of hits. With no hits it stands in for
 * a disabled search provider; tests also use it to simulate outages.
 */
export class StaticSearchService implements ISearchService {
  readonly name: string;
  /** Every query received, in order. */
  readonly queries: string[] = [];
  private readonly hits: SearchHit[];
  private readonly answer?: string;
  private readonly failWith?: ServiceError;

  constructor(options: StaticSearchOptions = {}) {
    this.hits = options.hits ?? [];
    this.answer = options.answer;
    this.failWith = options.failWith;
    this.name = this.hits.length > 0 || this.failWith ? 'static' : 'none';
  }

  async search(query: string, maxResults: number, _options: ServiceCallOptions): Promise<ServiceResult<SearchResults>> {
    this.queries.push(query);
    if (this.failWith) return err(this.failWith);
    const hits = this.hits.slice(0, maxResults);
    return ok(this.answer !== undefined ? { hits, answer: this.answer } : { hits });
  }
}
