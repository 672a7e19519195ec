import axios from 'axios';
import { z } from 'zod/v4';
import type { ServiceCallOptions, ServiceError, ServiceResult } from '@domain/ports/reasoning-service.js';
import type { ISearchService } from '@domain/ports/search-service.js';
import type { SecretEnv } from '@domain/ports/service-resolver.js';
import type { BuildBriefConfig } from '@domain/types/config.js';
import type { SearchResults } from '@domain/types/search.js';
import { ENV_KEYS } from '@shared/constants/paths.js';
import { ServiceConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { err, ok } from '@shared/lib/result.js';

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(z.object({
    title: z.string().default(''),
    url: z.string(),
    content: z.string().default(''),
    score: z.number().optional(),
  })).default([]),
});

/** Narrow slice of axios used for the search call. */
export type HttpPost = (
  url: string,
  body: Record<string, unknown>,
  config: { signal: AbortSignal; timeout: number },
) => Promise<{ data: unknown }>;

export interface TavilySearchOptions {
  apiKey: string;
  searchDepth: 'basic' | 'advanced';
  post?: HttpPost;
}

function toServiceError(error: unknown, timeoutMs: number): ServiceError {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ERR_CANCELED') {
      return { kind: 'timeout', message: `Tavily did not answer within ${timeoutMs}ms` };
    }
    const status = error.response?.status;
    return { kind: 'unavailable', message: `Tavily request failed${status ? ` with status ${status}` : ''}: ${error.message}` };
  }
  return { kind: 'unavailable', message: `Tavily request failed: ${error instanceof Error ? error.message : String(error)}` };
}

/**
 * Web search through the Tavily API. Asks for Tavily's summary answer
 * alongside the results.
 */
export class TavilySearchService implements ISearchService {
  readonly name = 'tavily';
  private readonly post: HttpPost;

  constructor(private readonly options: TavilySearchOptions) {
    this.post = options.post ?? ((url, body, config) => axios.post(url, body, config));
  }

  /** @throws ServiceConfigError when TAVILY_API_KEY is unset */
  static fromConfig(config: BuildBriefConfig, env: SecretEnv = process.env): TavilySearchService {
    const apiKey = env[ENV_KEYS.tavily];
    if (!apiKey) throw new ServiceConfigError('tavily', ENV_KEYS.tavily);
    return new TavilySearchService({ apiKey, searchDepth: config.search.searchDepth });
  }

  async search(query: string, maxResults: number, options: ServiceCallOptions): Promise<ServiceResult<SearchResults>> {
    let data: unknown;
    try {
      const response = await this.post(
        TAVILY_SEARCH_URL,
        {
          api_key: this.options.apiKey,
          query,
          max_results: maxResults,
          search_depth: this.options.searchDepth,
          include_answer: true,
        },
        { signal: options.signal, timeout: options.timeoutMs },
      );
      data = response.data;
    } catch (error) {
      return err(toServiceError(error, options.timeoutMs));
    }

    const parsed = TavilyResponseSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Unexpected Tavily response', { query, issues: parsed.error.issues.length });
      return err({ kind: 'malformed', message: 'Tavily response did not match the expected shape' });
    }
    const hits = parsed.data.results.slice(0, maxResults).map((result) => ({
      title: result.title,
      url: result.url,
      snippet: result.content,
      ...(result.score !== undefined ? { score: result.score } : {}),
    }));
    const answer = parsed.data.answer?.trim();
    return ok(answer ? { hits, answer } : { hits });
  }
}
