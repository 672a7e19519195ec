import { z } from 'zod/v4';
import { ErrorClassificationSchema } from './classification.js';
import { FixCandidateSchema } from './fix-candidate.js';
import { AnalysisStateSchema, StageOutcomeSchema } from './analysis-state.js';

// ---------------------------------------------------------------------------
// DebuggingBrief
// ---------------------------------------------------------------------------

/**
 * Terminal artifact of a successful analysis. Also the shape written by
 * `buildbrief analyze --format json` and read back by `buildbrief render`.
 */
export const DebuggingBriefSchema = z.object({
  id: z.string().uuid(),
  classification: ErrorClassificationSchema,
  /** Top-N candidates, highest confidence first. */
  fixCandidates: z.array(FixCandidateSchema),
  /** Set when no candidate could be produced at all. */
  noFixesFound: z.boolean(),
  overallConfidence: z.number().min(0).max(1),
  narrative: z.string(),
  /** True when the narrative failed its content check twice. */
  narrativeDegraded: z.boolean(),
  relevantLinks: z.array(z.string()),
  /** Distinct search results research worked from. Zero means it answered from general knowledge. */
  searchHitCount: z.number().int().min(0).default(0),
  warnings: z.array(z.string()),
  stageHistory: z.array(StageOutcomeSchema),
  generatedAt: z.string().datetime(),
  analysisDurationMs: z.number().int().min(0),
});

export type DebuggingBrief = z.infer<typeof DebuggingBriefSchema>;

// ---------------------------------------------------------------------------
// AnalysisFailure
// ---------------------------------------------------------------------------

export const FailedStageSchema = z.enum(['normalization', 'triage', 'research', 'synthesis']);
export type FailedStage = z.infer<typeof FailedStageSchema>;

export const FailureReasonSchema = z.enum([
  'service-unavailable',
  'timeout',
  'malformed-response',
  'input-too-large',
  'cancelled',
]);

export type FailureReason = z.infer<typeof FailureReasonSchema>;

export const AnalysisFailureSchema = z.object({
  failedStage: FailedStageSchema,
  reason: FailureReasonSchema,
  message: z.string(),
  /** Snapshot of the state at the moment the analysis gave up. */
  partialState: AnalysisStateSchema,
});

export type AnalysisFailure = z.infer<typeof AnalysisFailureSchema>;

export type AnalyzeResult =
  | { readonly ok: true; readonly brief: DebuggingBrief }
  | { readonly ok: false; readonly failure: AnalysisFailure };
