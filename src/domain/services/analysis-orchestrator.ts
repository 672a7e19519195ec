import { randomUUID } from 'node:crypto';
import type { ICodeContextSource } from '@domain/ports/code-context-source.js';
import type { IReasoningService } from '@domain/ports/reasoning-service.js';
import type { ISearchService } from '@domain/ports/search-service.js';
import {
  STAGE_STATUS,
  type AnalysisState,
  type AnalysisStatus,
  type StageName,
} from '@domain/types/analysis-state.js';
import type { AnalyzeResult, DebuggingBrief, FailedStage, FailureReason } from '@domain/types/brief.js';
import { AnalyzeOptionsSchema, type AnalyzeOptions, type AnalyzeOptionsInput } from '@domain/types/config.js';
import { checkNarrative } from '@domain/rules/ranking-rules.js';
import { backoffDelay, isRetryable } from '@domain/rules/retry-rules.js';
import { canTransition, isTerminalStatus } from '@domain/rules/status-rules.js';
import { sleep as defaultSleep } from '@shared/lib/async.js';
import { OrchestratorError, ValidationError } from '@shared/lib/errors.js';
import { deepFreeze } from '@shared/lib/freeze.js';
import { logger as defaultLogger, type Logger } from '@shared/lib/logger.js';
import { err, ok } from '@shared/lib/result.js';
import { normalize } from './log-normalizer.js';
import type { StageContext, StageError, StageResult } from './stages/stage-context.js';
import { triage } from './stages/triage-stage.js';
import { research } from './stages/research-stage.js';
import { synthesize, type SynthesisOutput } from './stages/synthesis-stage.js';

export interface AnalysisOrchestratorDeps {
  reasoning: IReasoningService;
  search: ISearchService;
  /** Repository the log came from, quoted during research. */
  codeContext?: ICodeContextSource;
  /** Wait between retries. Must resolve early when the signal aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
  newId?: () => string;
  logger?: Logger;
}

export interface AnalyzeCallOptions extends AnalyzeOptionsInput {
  /** Cancels the analysis; checked before each stage and each retry. */
  signal?: AbortSignal;
}

interface CheckedNarrative extends SynthesisOutput {
  degraded: boolean;
}

class AnalysisFailed extends Error {
  constructor(
    readonly failedStage: FailedStage,
    readonly reason: FailureReason,
    message: string,
  ) {
    super(message);
    this.name = 'AnalysisFailed';
  }
}

/**
 * Drives one analysis per `analyze` call through
 *   pending -> triaging -> researching -> synthesizing -> complete
 * with a side exit to `failed` from any non-terminal status.
 *
 * The orchestrator itself holds only read-only service handles, so a single
 * instance can run any number of analyses at once. Each call builds a fresh
 * `AnalysisState` which only this class mutates; stages get snapshots.
 */
export class AnalysisOrchestrator {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: AnalysisOrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  /**
   * Analyze one raw build log. Resolves to a brief or a failure record and
   * never rejects for anything that happens during the analysis.
   *
   * @throws ValidationError when `options` are out of range
   */
  async analyze(rawLog: string, options: AnalyzeCallOptions = {}): Promise<AnalyzeResult> {
    const { signal = new AbortController().signal, ...input } = options;
    const parsed = AnalyzeOptionsSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid analysis options', parsed.error.issues);
    }

    const startedAt = this.now();
    const state: AnalysisState = {
      id: this.newId(),
      startedAt: startedAt.toISOString(),
      sourceLog: '',
      fixCandidates: [],
      relevantLinks: [],
      stageHistory: [],
      warnings: [],
      status: 'pending',
    };
    const log = (this.deps.logger ?? defaultLogger).child({ analysisId: state.id });
    const ctx: StageContext = { options: parsed.data, signal, log };

    try {
      const brief = await this.run(rawLog, state, ctx, startedAt);
      log.info('Analysis complete', {
        category: brief.classification.category,
        candidates: brief.fixCandidates.length,
        overallConfidence: brief.overallConfidence,
        durationMs: brief.analysisDurationMs,
      });
      return { ok: true, brief };
    } catch (error) {
      const failure = error instanceof AnalysisFailed
        ? error
        : new AnalysisFailed(
          this.currentStage(state),
          'service-unavailable',
          error instanceof Error ? error.message : String(error),
        );
      if (!isTerminalStatus(state.status)) state.status = 'failed';
      log.error('Analysis failed', { stage: failure.failedStage, reason: failure.reason, detail: failure.message });
      return {
        ok: false,
        failure: {
          failedStage: failure.failedStage,
          reason: failure.reason,
          message: failure.message,
          partialState: structuredClone(state),
        },
      };
    }
  }

  private async run(
    rawLog: string,
    state: AnalysisState,
    ctx: StageContext,
    startedAt: Date,
  ): Promise<DebuggingBrief> {
    const { options } = ctx;
    if (rawLog.length > options.maxInputLength) {
      throw new AnalysisFailed(
        'normalization',
        'input-too-large',
        `Build log is ${rawLog.length} characters; the limit is ${options.maxInputLength}`,
      );
    }
    state.sourceLog = normalize(rawLog, options.maxLogLength, { headLength: options.headLength });
    ctx.log.debug('Log normalized', { rawLength: rawLog.length, length: state.sourceLog.length });

    const classification = await this.runStage('triage', state, ctx, (stageCtx) =>
      triage(structuredClone(state), this.deps.reasoning, stageCtx),
    );
    state.classification = classification;

    const { reasoning, search, codeContext } = this.deps;
    const findings = await this.runStage('research', state, ctx, (stageCtx) =>
      research(structuredClone(state), { reasoning, search, ...(codeContext ? { codeContext } : {}) }, stageCtx),
    );
    state.fixCandidates = findings.candidates;
    state.relevantLinks = findings.relevantLinks;
    state.warnings.push(...findings.warnings);
    ctx.log.info('Research complete', {
      searchHits: findings.searchHitCount,
      candidates: findings.candidates.length,
    });

    const synthesis = await this.runStage('synthesis', state, ctx, (stageCtx) =>
      this.synthesizeChecked(state, stageCtx),
    );
    if (synthesis.degraded) {
      state.warnings.push(
        `Narrative does not mention ${synthesis.requiredPhrases.map((p) => `"${p}"`).join(' and ')}; kept as degraded.`,
      );
    }

    this.transition(state, 'complete', ctx.log);
    const finishedAt = this.now();
    return deepFreeze(structuredClone({
      id: state.id,
      classification,
      fixCandidates: state.fixCandidates,
      noFixesFound: state.fixCandidates.length === 0,
      overallConfidence: synthesis.overallConfidence,
      narrative: synthesis.narrative,
      narrativeDegraded: synthesis.degraded,
      relevantLinks: state.relevantLinks,
      searchHitCount: findings.searchHitCount,
      warnings: state.warnings,
      stageHistory: state.stageHistory,
      generatedAt: finishedAt.toISOString(),
      analysisDurationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
    }));
  }

  /**
   * Enter the stage's status, run it under the retry policy and record one
   * `StageOutcome`. Returns the stage value or throws `AnalysisFailed`.
   */
  private async runStage<T>(
    name: StageName,
    state: AnalysisState,
    ctx: StageContext,
    attempt: (ctx: StageContext) => Promise<StageResult<T>>,
  ): Promise<T> {
    if (ctx.signal.aborted) {
      throw new AnalysisFailed(name, 'cancelled', `Analysis cancelled before ${name}`);
    }
    const status = STAGE_STATUS[name];
    this.transition(state, status, ctx.log);

    const stageStartedAt = this.now().toISOString();
    const { maxRetries, backoffBaseMs, backoffMaxMs } = ctx.options;
    let retryCount = 0;
    let result = await this.attemptOnce(attempt, ctx);

    while (!result.ok && isRetryable(result.error.reason) && retryCount < maxRetries) {
      retryCount++;
      const delayMs = backoffDelay(retryCount, backoffBaseMs, backoffMaxMs);
      ctx.log.warn('Stage failed, retrying', { stage: name, retry: retryCount, delayMs, detail: result.error.detail });
      await this.sleep(delayMs, ctx.signal);
      if (ctx.signal.aborted) {
        result = err<StageError>({ reason: 'cancelled', detail: `${name}: cancelled before retry ${retryCount}` });
        break;
      }
      result = await this.attemptOnce(attempt, ctx);
    }

    state.stageHistory.push({
      stageName: name,
      status,
      startedAt: stageStartedAt,
      finishedAt: this.now().toISOString(),
      succeeded: result.ok,
      ...(result.ok ? {} : { errorDetail: result.error.detail }),
      retryCount,
    });

    if (!result.ok) {
      throw new AnalysisFailed(name, result.error.reason, result.error.detail);
    }
    return result.value;
  }

  /** One attempt. Exceptions become outages; results that arrive after cancellation are dropped. */
  private async attemptOnce<T>(
    attempt: (ctx: StageContext) => Promise<StageResult<T>>,
    ctx: StageContext,
  ): Promise<StageResult<T>> {
    let result: StageResult<T>;
    try {
      result = await attempt(ctx);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result = err<StageError>({ reason: 'service-unavailable', detail: message });
    }
    if (ctx.signal.aborted && (result.ok || result.error.reason !== 'cancelled')) {
      return err<StageError>({ reason: 'cancelled', detail: 'Analysis cancelled; stage result discarded' });
    }
    return result;
  }

  /**
   * Synthesize, then check the narrative names the error type and the top
   * fix. A failing narrative is regenerated once; if the second draft also
   * fails (or the second request does), the analysis keeps a degraded one.
   */
  private async synthesizeChecked(
    state: AnalysisState,
    ctx: StageContext,
  ): Promise<StageResult<CheckedNarrative>> {
    const first = await synthesize(structuredClone(state), this.deps.reasoning, ctx);
    if (!first.ok) return first;
    if (checkNarrative(first.value.narrative, first.value.requiredPhrases).ok) {
      return ok({ ...first.value, degraded: false });
    }

    ctx.log.warn('Narrative failed its content check, regenerating');
    const second = await synthesize(structuredClone(state), this.deps.reasoning, { ...ctx, regenerate: true });
    if (!second.ok) {
      if (second.error.reason === 'cancelled') return second;
      ctx.log.warn('Narrative regeneration failed, keeping first draft', { detail: second.error.detail });
      return ok({ ...first.value, degraded: true });
    }
    const degraded = !checkNarrative(second.value.narrative, second.value.requiredPhrases).ok;
    return ok({ ...second.value, degraded });
  }

  private transition(state: AnalysisState, to: AnalysisStatus, log: Logger): void {
    if (!canTransition(state.status, to)) {
      throw new OrchestratorError(`Illegal status transition ${state.status} -> ${to}`);
    }
    log.debug('Status transition', { from: state.status, to });
    state.status = to;
  }

  /** The stage that is running, or would run next, for the current status. */
  private currentStage(state: AnalysisState): FailedStage {
    switch (state.status) {
      case 'researching':
        return 'research';
      case 'synthesizing':
      case 'complete':
        return 'synthesis';
      default:
        return 'triage';
    }
  }
}
