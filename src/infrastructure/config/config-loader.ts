import { join, resolve } from 'node:path';
import type { SecretEnv } from '@domain/ports/service-resolver.js';
import { BuildBriefConfigSchema, type BuildBriefConfig } from '@domain/types/config.js';
import { BUILDBRIEF_FILES, ENV_KEYS } from '@shared/constants/paths.js';
import { ConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { JsonStore, JsonStoreError } from '@infra/persistence/json-store.js';

export interface LoadedConfig {
  config: BuildBriefConfig;
  /** File the config came from; undefined when only defaults apply. */
  source?: string;
}

/** Values given on the command line. Each one wins over the config file. */
export interface ConfigOverrides {
  maxCandidates?: number;
  timeoutMs?: number;
  maxRetries?: number;
  noSearch?: boolean;
}

/**
 * Load `buildbrief.config.json`.
 *
 * An explicit `configPath` must exist. Without one, the file in `cwd` is
 * optional and schema defaults apply when it is absent.
 *
 * @throws ConfigError when the file is unreadable or invalid
 */
export function loadConfig(cwd: string, configPath?: string): LoadedConfig {
  const path = configPath ? resolve(cwd, configPath) : join(cwd, BUILDBRIEF_FILES.config);
  if (!configPath && !JsonStore.exists(path)) {
    logger.debug('No config file, using defaults', { path });
    return { config: BuildBriefConfigSchema.parse({}) };
  }
  try {
    return { config: JsonStore.read(path, BuildBriefConfigSchema), source: path };
  } catch (error) {
    if (error instanceof JsonStoreError) throw new ConfigError(path, error.message);
    throw error;
  }
}

export function applyOverrides(config: BuildBriefConfig, overrides: ConfigOverrides): BuildBriefConfig {
  const { maxCandidates, timeoutMs, maxRetries, noSearch } = overrides;
  return {
    ...config,
    search: noSearch ? { ...config.search, provider: 'none' } : config.search,
    analysis: {
      ...config.analysis,
      ...(maxCandidates !== undefined ? { maxCandidates } : {}),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(maxRetries !== undefined ? { maxRetries } : {}),
    },
  };
}

export type SecretStatus = Record<(typeof ENV_KEYS)[keyof typeof ENV_KEYS], 'set' | 'missing'>;

/** Which API keys are present. Never returns the values. */
export function describeSecrets(env: SecretEnv = process.env): SecretStatus {
  const status = (key: string): 'set' | 'missing' => (env[key] ? 'set' : 'missing');
  return {
    ANTHROPIC_API_KEY: status(ENV_KEYS.anthropic),
    TAVILY_API_KEY: status(ENV_KEYS.tavily),
    GITHUB_TOKEN: status(ENV_KEYS.github),
  };
}
