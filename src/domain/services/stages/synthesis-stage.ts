import type { IReasoningService, StructuredValue } from '@domain/ports/reasoning-service.js';
import type { AnalysisState } from '@domain/types/analysis-state.js';
import type { ErrorClassification } from '@domain/types/classification.js';
import type { FixCandidate } from '@domain/types/fix-candidate.js';
import { coerceText, isRecord } from '@domain/rules/coercion-rules.js';
import { computeOverallConfidence } from '@domain/rules/ranking-rules.js';
import { err, ok } from '@shared/lib/result.js';
import { buildNarrativeRequest } from './prompts.js';
import { callService, type StageContext, type StageError, type StageResult } from './stage-context.js';

export interface SynthesisOutput {
  narrative: string;
  overallConfidence: number;
  /** Phrases the narrative has to contain: the error type and the top fix title. */
  requiredPhrases: string[];
}

/** Narrative used when the service answers with nothing. Always passes the content check. */
export function fallbackNarrative(classification: ErrorClassification, topFix: FixCandidate | undefined): string {
  const cause = classification.rootCause || classification.message || 'the cause could not be determined';
  const opening = `The build failed with ${classification.errorType}: ${cause}`.replace(/[.\s]+$/, '') + '.';
  return topFix
    ? `${opening} Start with "${topFix.title}".`
    : `${opening} No fix could be proposed from the available information.`;
}

function extractNarrative(value: StructuredValue): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (isRecord(value)) return coerceText(value['narrative'] ?? value['summary']);
  return undefined;
}

/**
 * Score the analysis and ask for the narrative.
 *
 * The narrative's content check belongs to the orchestrator; this stage only
 * reports which phrases it must contain.
 */
export async function synthesize(
  state: Readonly<AnalysisState>,
  reasoning: IReasoningService,
  ctx: StageContext,
): Promise<StageResult<SynthesisOutput>> {
  const classification = state.classification;
  if (!classification) {
    return err<StageError>({ reason: 'malformed-response', detail: 'synthesis: no classification to summarize' });
  }

  const topFix = state.fixCandidates[0];
  const overallConfidence = computeOverallConfidence(
    topFix?.confidence,
    classification.category,
    ctx.options.confidenceWeights,
  );
  const requiredPhrases = topFix ? [classification.errorType, topFix.title] : [classification.errorType];

  const request = buildNarrativeRequest(classification, topFix, ctx.regenerate ?? false);
  const answer = await callService(ctx, 'narrative', (options) => reasoning.call(request, options));
  if (!answer.ok) return answer;

  const narrative = extractNarrative(answer.value);
  if (narrative === undefined) {
    return err<StageError>({ reason: 'malformed-response', detail: 'narrative: answer is neither text nor an object' });
  }
  if (narrative === '') {
    ctx.log.warn('Empty narrative, using fallback text');
    return ok({ narrative: fallbackNarrative(classification, topFix), overallConfidence, requiredPhrases });
  }
  return ok({ narrative, overallConfidence, requiredPhrases });
}
