import type { BuildFailureRef, IBuildLogSource } from '@domain/ports/build-log-source.js';
import type { ICodeContextSource } from '@domain/ports/code-context-source.js';
import type { IReasoningServiceResolver, ISearchServiceResolver, SecretEnv } from '@domain/ports/service-resolver.js';
import type { AnalyzeResult } from '@domain/types/brief.js';
import type { BuildBriefConfig } from '@domain/types/config.js';
import { AnalysisOrchestrator } from '@domain/services/analysis-orchestrator.js';
import { ReasoningServiceResolver, SearchServiceResolver } from '@infra/service-resolver.js';
import { GitHubCodeContextSource } from '@infra/code-context/github-code-context-source.js';
import { FileLogSource } from '@infra/logs/file-log-source.js';
import { GitHubLogSource } from '@infra/logs/github-log-source.js';
import { logger as defaultLogger, type Logger } from '@shared/lib/logger.js';

/**
 * Dependencies injected into the analyze runner for testability.
 */
export interface AnalyzeRunnerDeps {
  reasoningResolver?: IReasoningServiceResolver;
  searchResolver?: ISearchServiceResolver;
  /** Picks the log source for a reference. */
  logSourceFor?: (ref: BuildFailureRef, env: SecretEnv) => IBuildLogSource;
  /** Picks the repository context source for a reference, if it names a repository. */
  codeContextFor?: (ref: BuildFailureRef, env: SecretEnv) => ICodeContextSource | undefined;
  env?: SecretEnv;
  logger?: Logger;
}

export interface AnalyzeRunRequest {
  ref: BuildFailureRef;
  config: BuildBriefConfig;
  signal?: AbortSignal;
}

export function defaultLogSourceFor(ref: BuildFailureRef, env: SecretEnv): IBuildLogSource {
  return ref.kind === 'file' ? new FileLogSource() : GitHubLogSource.fromEnv(env);
}

export function defaultCodeContextFor(ref: BuildFailureRef, env: SecretEnv): ICodeContextSource | undefined {
  return ref.kind === 'github' ? GitHubCodeContextSource.fromEnv(ref.owner, ref.repo, env) : undefined;
}

/**
 * Fetches a build log, builds the services the config names and runs one
 * analysis over them.
 *
 * Service construction happens before the log is fetched so a missing API
 * key fails fast. Problems getting the log or building services throw;
 * anything that goes wrong inside the analysis comes back as a failure.
 */
export class AnalyzeRunner {
  private readonly reasoningResolver: IReasoningServiceResolver;
  private readonly searchResolver: ISearchServiceResolver;
  private readonly logSourceFor: (ref: BuildFailureRef, env: SecretEnv) => IBuildLogSource;
  private readonly codeContextFor: (ref: BuildFailureRef, env: SecretEnv) => ICodeContextSource | undefined;
  private readonly env: SecretEnv;
  private readonly log: Logger;

  constructor(deps: AnalyzeRunnerDeps = {}) {
    this.reasoningResolver = deps.reasoningResolver ?? ReasoningServiceResolver;
    this.searchResolver = deps.searchResolver ?? SearchServiceResolver;
    this.logSourceFor = deps.logSourceFor ?? defaultLogSourceFor;
    this.codeContextFor = deps.codeContextFor ?? defaultCodeContextFor;
    this.env = deps.env ?? process.env;
    this.log = deps.logger ?? defaultLogger;
  }

  async run(request: AnalyzeRunRequest): Promise<AnalyzeResult> {
    const { ref, config, signal } = request;
    const reasoning = this.reasoningResolver.resolve(config, this.env);
    const search = this.searchResolver.resolve(config, this.env);
    this.log.debug('Services resolved', { reasoning: reasoning.name, search: search.name });

    const rawLog = await this.logSourceFor(ref, this.env).fetchLog(ref);
    this.log.debug('Build log loaded', { source: ref.kind, length: rawLog.length });

    const codeContext = this.codeContextFor(ref, this.env);
    const orchestrator = new AnalysisOrchestrator({
      reasoning,
      search,
      ...(codeContext ? { codeContext } : {}),
      logger: this.log,
    });
    return orchestrator.analyze(rawLog, {
      ...config.analysis,
      maxSearchResults: config.search.maxResults,
      ...(signal ? { signal } : {}),
    });
  }
}
