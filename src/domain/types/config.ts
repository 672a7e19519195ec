import { z } from 'zod/v4';

// ---------------------------------------------------------------------------
// Analysis options
// ---------------------------------------------------------------------------

export const ConfidenceWeightsSchema = z.object({
  /** Weight of the top fix candidate's confidence. */
  top: z.number().min(0).max(1).default(0.7),
  /** Weight of the recognized-category proxy (1 when category is not unknown). */
  triage: z.number().min(0).max(1).default(0.3),
});

export type ConfidenceWeights = z.infer<typeof ConfidenceWeightsSchema>;

/**
 * Tunables for one `analyze` call. Passed explicitly; there is no
 * process-wide copy, so concurrent analyses can run with different values.
 */
export const AnalyzeOptionsSchema = z.object({
  /** Fix candidates kept in the brief. */
  maxCandidates: z.number().int().min(1).default(3),
  /** Deadline for each individual reasoning or search call. */
  timeoutMs: z.number().int().positive().default(30_000),
  /** Retries per stage after the first attempt (2 means 3 attempts). */
  maxRetries: z.number().int().min(0).default(2),
  backoffBaseMs: z.number().int().min(0).default(1_000),
  backoffMaxMs: z.number().int().min(0).default(8_000),
  /** Size of the normalized excerpt handed to triage. */
  maxLogLength: z.number().int().min(0).default(12_000),
  /** Leading characters kept when the excerpt is truncated. */
  headLength: z.number().int().min(0).default(1_000),
  /** Raw logs longer than this are rejected before normalization. */
  maxInputLength: z.number().int().positive().default(5_000_000),
  maxQueries: z.number().int().min(1).default(2),
  maxSearchResults: z.number().int().min(1).default(5),
  confidenceWeights: ConfidenceWeightsSchema.default(() => ({ top: 0.7, triage: 0.3 })),
});

export type AnalyzeOptions = z.infer<typeof AnalyzeOptionsSchema>;
export type AnalyzeOptionsInput = z.input<typeof AnalyzeOptionsSchema>;

// ---------------------------------------------------------------------------
// buildbrief.config.json
// ---------------------------------------------------------------------------

/** Anthropic model used when `reasoning.model` is unset. The claude CLI keeps its own default. */
export const DEFAULT_REASONING_MODEL = 'claude-sonnet-4-20250514';

export const ReasoningBackendSchema = z.enum(['anthropic', 'claude-cli']);
export type ReasoningBackend = z.infer<typeof ReasoningBackendSchema>;

export const SearchProviderSchema = z.enum(['tavily', 'none']);
export type SearchProvider = z.infer<typeof SearchProviderSchema>;

export const BuildBriefConfigSchema = z.object({
  reasoning: z.object({
    backend: ReasoningBackendSchema.default('anthropic'),
    model: z.string().min(1).optional(),
    maxTokens: z.number().int().positive().default(2048),
    /** Path to the `claude` binary when backend is claude-cli. Defaults to PATH lookup. */
    binaryPath: z.string().optional(),
  }).default(() => ({
    backend: 'anthropic' as const,
    maxTokens: 2048,
  })),
  search: z.object({
    provider: SearchProviderSchema.default('tavily'),
    maxResults: z.number().int().min(1).default(5),
    /**
     * Tavily search depth.
     * - 'basic' (default): faster, fewer sources
     * - 'advanced': slower, more thorough
     */
    searchDepth: z.enum(['basic', 'advanced']).default('basic'),
  }).default(() => ({
    provider: 'tavily' as const,
    maxResults: 5,
    searchDepth: 'basic' as const,
  })),
  /** Defaults for every analysis; CLI flags override individual values. */
  analysis: AnalyzeOptionsSchema.default(() => AnalyzeOptionsSchema.parse({})),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type BuildBriefConfig = z.infer<typeof BuildBriefConfigSchema>;
