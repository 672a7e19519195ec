import { z } from 'zod/v4';

/** Prefix carried by the rationale of every candidate produced without search results. */
export const SEARCH_INDEPENDENT_MARKER = '[search-independent]';

export const FixSourceSchema = z.enum(['web-research', 'general-knowledge', 'triage']);
export type FixSource = z.infer<typeof FixSourceSchema>;

export const FixCandidateSchema = z.object({
  title: z.string().min(1),
  /** Clamped to [0, 1] before it ever reaches this schema. */
  confidence: z.number().min(0).max(1),
  rationale: z.string(),
  steps: z.array(z.string()),
  codeExample: z.string().optional(),
  source: FixSourceSchema,
  searchIndependent: z.boolean(),
});

export type FixCandidate = z.infer<typeof FixCandidateSchema>;
