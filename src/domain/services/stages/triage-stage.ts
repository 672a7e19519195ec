import type { IReasoningService, StructuredValue } from '@domain/ports/reasoning-service.js';
import type { AnalysisState } from '@domain/types/analysis-state.js';
import {
  FALLBACK_ERROR_TYPE,
  INSUFFICIENT_LOG_ERROR_TYPE,
  UNKNOWN_CATEGORY,
  type ErrorClassification,
} from '@domain/types/classification.js';
import {
  coerceCategory,
  coerceSeverity,
  coerceStringList,
  coerceText,
  isRecord,
  uniqueStrings,
} from '@domain/rules/coercion-rules.js';
import { err, ok } from '@shared/lib/result.js';
import { buildTriageRequest } from './prompts.js';
import { callService, type StageContext, type StageError, type StageResult } from './stage-context.js';

/** Classification used when there is no log text to classify. */
export function insufficientLogClassification(): ErrorClassification {
  return {
    errorType: INSUFFICIENT_LOG_ERROR_TYPE,
    category: UNKNOWN_CATEGORY,
    severity: 'medium',
    message: 'The build log was empty after normalization.',
    affectedResources: [],
    rootCause: 'Not enough log output to determine a root cause.',
    suggestions: [],
  };
}

/**
 * Coerce a triage answer into a classification. Returns undefined only when
 * the answer is not a JSON object at all.
 */
export function coerceClassification(value: StructuredValue): ErrorClassification | undefined {
  if (!isRecord(value)) return undefined;
  const researchQueries = coerceStringList(value['researchQueries']);
  return {
    errorType: coerceText(value['errorType'], FALLBACK_ERROR_TYPE),
    category: coerceCategory(value['category']),
    severity: coerceSeverity(value['severity']),
    message: coerceText(value['message']),
    affectedResources: uniqueStrings(coerceStringList(value['affectedResources'])),
    rootCause: coerceText(value['rootCause']),
    suggestions: coerceStringList(value['suggestions']),
    ...(researchQueries.length > 0 ? { researchQueries } : {}),
  };
}

/**
 * Classify the normalized log with one structured request.
 *
 * An empty log never reaches the service. Out-of-vocabulary answers are
 * coerced rather than rejected; only a non-object answer is malformed.
 */
export async function triage(
  state: Readonly<AnalysisState>,
  reasoning: IReasoningService,
  ctx: StageContext,
): Promise<StageResult<ErrorClassification>> {
  if (state.sourceLog === '') {
    ctx.log.debug('Empty log, skipping triage request');
    return ok(insufficientLogClassification());
  }

  const request = buildTriageRequest(state.sourceLog);
  const answer = await callService(ctx, 'triage', (options) => reasoning.call(request, options));
  if (!answer.ok) return answer;

  const classification = coerceClassification(answer.value);
  if (!classification) {
    return err<StageError>({ reason: 'malformed-response', detail: 'triage: answer is not a JSON object' });
  }
  return ok(classification);
}
