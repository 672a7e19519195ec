import type { Logger } from '@shared/lib/logger.js';
import { runWithDeadline } from '@shared/lib/async.js';
import { err, ok, type Result } from '@shared/lib/result.js';
import type { AnalyzeOptions } from '@domain/types/config.js';
import type { FailureReason } from '@domain/types/brief.js';
import type { ServiceCallOptions, ServiceErrorKind, ServiceResult } from '@domain/ports/reasoning-service.js';

/** Reasons a stage can fail with. Input size is checked before any stage runs. */
export type StageFailureReason = Exclude<FailureReason, 'input-too-large'>;

export interface StageError {
  reason: StageFailureReason;
  detail: string;
}

export type StageResult<T> = Result<T, StageError>;

export interface StageContext {
  options: AnalyzeOptions;
  /** The analysis-wide cancellation signal. */
  signal: AbortSignal;
  log: Logger;
  /** Set on the second narrative request after the first failed its content check. */
  regenerate?: boolean;
}

const REASON_BY_KIND: Record<ServiceErrorKind, StageFailureReason> = {
  unavailable: 'service-unavailable',
  timeout: 'timeout',
  malformed: 'malformed-response',
};

/**
 * Run one external call under the per-call deadline and the analysis signal,
 * and translate every way it can end into a `StageResult`. Never throws.
 */
export async function callService<T>(
  ctx: StageContext,
  label: string,
  call: (options: ServiceCallOptions) => Promise<ServiceResult<T>>,
): Promise<StageResult<T>> {
  const timeoutMs = ctx.options.timeoutMs;
  try {
    const outcome = await runWithDeadline((signal) => call({ signal, timeoutMs }), timeoutMs, ctx.signal);
    if (outcome.status === 'aborted') {
      return err<StageError>({ reason: 'cancelled', detail: `${label}: cancelled` });
    }
    if (outcome.status === 'timeout') {
      return err<StageError>({ reason: 'timeout', detail: `${label}: no answer within ${timeoutMs}ms` });
    }
    const result = outcome.value;
    if (result.ok) return ok(result.value);
    return err<StageError>({ reason: REASON_BY_KIND[result.error.kind], detail: `${label}: ${result.error.message}` });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err<StageError>({ reason: 'service-unavailable', detail: `${label}: ${message}` });
  }
}
