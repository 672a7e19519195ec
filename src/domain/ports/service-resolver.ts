import type { BuildBriefConfig } from '@domain/types/config.js';
import type { IReasoningService } from './reasoning-service.js';
import type { ISearchService } from './search-service.js';

/** Environment variables consulted for API keys. */
export type SecretEnv = Readonly<Record<string, string | undefined>>;

/**
 * Port interfaces for building service handles from project configuration.
 * Satisfied by the resolver classes themselves, whose `resolve` is static.
 */
export interface IReasoningServiceResolver {
  resolve(config: BuildBriefConfig, env?: SecretEnv): IReasoningService;
}

export interface ISearchServiceResolver {
  resolve(config: BuildBriefConfig, env?: SecretEnv): ISearchService;
}
