import type { FixCandidate } from '@domain/types/fix-candidate.js';
import type { ConfidenceWeights } from '@domain/types/config.js';
import { UNKNOWN_CATEGORY, type ErrorCategory } from '@domain/types/classification.js';

/**
 * Sort by descending confidence and keep the first `max`.
 * Equal confidences keep their generation order.
 */
export function rankCandidates(candidates: readonly FixCandidate[], max: number): FixCandidate[] {
  return [...candidates]
    .sort((a, b) => b.confidence - a.confidence)
    .slice(0, Math.max(0, max));
}

/**
 * Weighted confidence for the whole brief.
 *
 *   weights.top * topConfidence + weights.triage * (category recognized ? 1 : 0)
 *
 * With no candidates the first term is 0. The result is clamped to [0, 1]
 * since the weights are configurable.
 */
export function computeOverallConfidence(
  topConfidence: number | undefined,
  category: ErrorCategory,
  weights: ConfidenceWeights,
): number {
  const triageProxy = category === UNKNOWN_CATEGORY ? 0 : 1;
  const score = weights.top * (topConfidence ?? 0) + weights.triage * triageProxy;
  return Math.min(1, Math.max(0, score));
}

export interface NarrativeCheck {
  ok: boolean;
  /** Required phrases not found in the narrative. */
  missing: string[];
}

/** Case-insensitive check that every required phrase appears in the narrative. */
export function checkNarrative(narrative: string, required: readonly string[]): NarrativeCheck {
  const haystack = narrative.toLowerCase();
  const missing = required.filter((phrase) => phrase !== '' && !haystack.includes(phrase.toLowerCase()));
  return { ok: missing.length === 0, missing };
}
