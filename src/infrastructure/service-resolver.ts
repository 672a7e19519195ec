import type { IReasoningService } from '@domain/ports/reasoning-service.js';
import type { ISearchService } from '@domain/ports/search-service.js';
import type { SecretEnv } from '@domain/ports/service-resolver.js';
import type { BuildBriefConfig } from '@domain/types/config.js';
import { ServiceConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { AnthropicReasoningService } from './reasoning/anthropic-reasoning-service.js';
import { ClaudeCliReasoningService } from './reasoning/claude-cli-reasoning-service.js';
import { StaticSearchService } from './search/static-search-service.js';
import { TavilySearchService } from './search/tavily-search-service.js';

type ServiceFactory<T> = (config: BuildBriefConfig, env: SecretEnv) => T;

/** `--model` is passed only when the config names one. */
export function claudeCliServiceFromConfig(config: BuildBriefConfig): ClaudeCliReasoningService {
  return new ClaudeCliReasoningService({
    binaryPath: config.reasoning.binaryPath,
    model: config.reasoning.model,
  });
}

function unknownName(kind: string, name: string, registry: Map<string, unknown>): Error {
  const validList = [...registry.keys()].join(', ');
  return new Error(`Unknown ${kind}: "${name}". Valid values are: ${validList}`);
}

/**
 * Resolves the reasoning service named by `reasoning.backend`.
 *
 * Uses a static registry so other backends can be added without touching
 * this file:
 *
 *   ReasoningServiceResolver.register('my-llm', (config, env) => new MyLlm(config));
 */
export class ReasoningServiceResolver {
  private static readonly registry = new Map<string, ServiceFactory<IReasoningService>>([
    ['anthropic', (config, env) => AnthropicReasoningService.fromConfig(config, env)],
    ['claude-cli', claudeCliServiceFromConfig],
  ]);

  /**
   * Register a new backend factory under the given name.
   * Warns when overwriting an existing registration.
   */
  static register(name: string, factory: ServiceFactory<IReasoningService>): void {
    if (ReasoningServiceResolver.registry.has(name)) {
      logger.warn(`ReasoningServiceResolver: overwriting existing registration for "${name}".`);
    }
    ReasoningServiceResolver.registry.set(name, factory);
  }

  /** Remove a registered factory. Primarily for test cleanup. */
  static unregister(name: string): void {
    ReasoningServiceResolver.registry.delete(name);
  }

  /**
   * @throws ServiceConfigError when the backend's credentials are missing
   * @throws Error if the backend name is not registered
   */
  static resolve(config: BuildBriefConfig, env: SecretEnv = process.env): IReasoningService {
    const name = config.reasoning.backend;
    const factory = ReasoningServiceResolver.registry.get(name);
    if (!factory) throw unknownName('reasoning backend', name, ReasoningServiceResolver.registry);
    return factory(config, env);
  }
}

/**
 * Resolves the search service named by `search.provider`. A provider that
 * cannot be configured degrades to no search rather than failing the run.
 */
export class SearchServiceResolver {
  private static readonly registry = new Map<string, ServiceFactory<ISearchService>>([
    ['tavily', (config, env) => TavilySearchService.fromConfig(config, env)],
    ['none', () => new StaticSearchService()],
  ]);

  static register(name: string, factory: ServiceFactory<ISearchService>): void {
    if (SearchServiceResolver.registry.has(name)) {
      logger.warn(`SearchServiceResolver: overwriting existing registration for "${name}".`);
    }
    SearchServiceResolver.registry.set(name, factory);
  }

  static unregister(name: string): void {
    SearchServiceResolver.registry.delete(name);
  }

  /** @throws Error if the provider name is not registered */
  static resolve(config: BuildBriefConfig, env: SecretEnv = process.env): ISearchService {
    const name = config.search.provider;
    const factory = SearchServiceResolver.registry.get(name);
    if (!factory) throw unknownName('search provider', name, SearchServiceResolver.registry);
    try {
      return factory(config, env);
    } catch (error) {
      if (!(error instanceof ServiceConfigError)) throw error;
      logger.warn(`${error.message} Continuing without web search.`);
      return new StaticSearchService();
    }
  }
}
