import { z } from 'zod/v4';
import { ErrorClassificationSchema } from './classification.js';
import { FixCandidateSchema } from './fix-candidate.js';

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export const AnalysisStatusSchema = z.enum([
  'pending',
  'triaging',
  'researching',
  'synthesizing',
  'complete',
  'failed',
]);

export type AnalysisStatus = z.infer<typeof AnalysisStatusSchema>;

/** Forward order of the non-failure statuses. `failed` sits outside it. */
export const ANALYSIS_STATUS_ORDER: readonly AnalysisStatus[] = [
  'pending',
  'triaging',
  'researching',
  'synthesizing',
  'complete',
];

export const StageNameSchema = z.enum(['triage', 'research', 'synthesis']);
export type StageName = z.infer<typeof StageNameSchema>;

/** The status an analysis is in while each stage runs. */
export const STAGE_STATUS: Readonly<Record<StageName, AnalysisStatus>> = {
  triage: 'triaging',
  research: 'researching',
  synthesis: 'synthesizing',
};

// ---------------------------------------------------------------------------
// StageOutcome
// ---------------------------------------------------------------------------

/**
 * One entry in the audit trail. Exactly one is appended per stage, after
 * its final attempt, whether or not it succeeded.
 */
export const StageOutcomeSchema = z.object({
  stageName: StageNameSchema,
  /** Analysis status the stage ran in. */
  status: AnalysisStatusSchema,
  /** ISO 8601 timestamp of the first attempt. */
  startedAt: z.string().datetime(),
  /** ISO 8601 timestamp after the last attempt. */
  finishedAt: z.string().datetime(),
  succeeded: z.boolean(),
  errorDetail: z.string().optional(),
  /** Attempts beyond the first. */
  retryCount: z.number().int().min(0),
});

export type StageOutcome = z.infer<typeof StageOutcomeSchema>;

// ---------------------------------------------------------------------------
// AnalysisState
// ---------------------------------------------------------------------------

/**
 * The record threaded through one analysis. Only the orchestrator mutates
 * it; stages receive a snapshot.
 */
export const AnalysisStateSchema = z.object({
  id: z.string().uuid(),
  startedAt: z.string().datetime(),
  /** Normalized excerpt. Set once before triage. */
  sourceLog: z.string(),
  /** Set at the triaging -> researching transition. */
  classification: ErrorClassificationSchema.optional(),
  /** Empty until research completes. */
  fixCandidates: z.array(FixCandidateSchema),
  relevantLinks: z.array(z.string()),
  stageHistory: z.array(StageOutcomeSchema),
  warnings: z.array(z.string()),
  status: AnalysisStatusSchema,
});

export type AnalysisState = z.infer<typeof AnalysisStateSchema>;
