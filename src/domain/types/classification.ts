import { z } from 'zod/v4';

// ---------------------------------------------------------------------------
// Category vocabulary
// ---------------------------------------------------------------------------

/** Reserved bucket for any label outside the fixed vocabulary. */
export const UNKNOWN_CATEGORY = 'unknown';

export const ErrorCategorySchema = z.enum([
  // dependency
  'missing_package',
  'version_conflict',
  'incompatible_dependency',
  // code
  'syntax_error',
  'type_error',
  'import_error',
  // test
  'assertion_failure',
  'test_timeout',
  'fixture_error',
  // configuration
  'missing_env_var',
  'invalid_config',
  'missing_file',
  // infrastructure
  'network_error',
  'permission_denied',
  'resource_limit',
  UNKNOWN_CATEGORY,
]);

export type ErrorCategory = z.infer<typeof ErrorCategorySchema>;

export const SeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);
export type Severity = z.infer<typeof SeveritySchema>;

export const DEFAULT_SEVERITY: Severity = 'medium';

// ---------------------------------------------------------------------------
// ErrorClassification
// ---------------------------------------------------------------------------

/**
 * Triage output: what went wrong, how badly, and where.
 * Built once per analysis and never modified afterwards.
 */
export const ErrorClassificationSchema = z.object({
  /** Taxonomy label, e.g. "SyntaxError" or "ModuleNotFoundError". */
  errorType: z.string().min(1),
  category: ErrorCategorySchema,
  severity: SeveritySchema,
  /** Literal error text lifted from the log. */
  message: z.string(),
  /** File paths or config keys implicated; unique, in first-seen order. */
  affectedResources: z.array(z.string()),
  /** One-sentence root cause. */
  rootCause: z.string(),
  /** Immediate fixes proposed during triage, used when research yields nothing. */
  suggestions: z.array(z.string()),
  /** Web search queries triage proposed; searched before the derived ones. */
  researchQueries: z.array(z.string()).optional(),
});

export type ErrorClassification = z.infer<typeof ErrorClassificationSchema>;

export const INSUFFICIENT_LOG_ERROR_TYPE = 'InsufficientLogData';
export const FALLBACK_ERROR_TYPE = 'UnknownError';
