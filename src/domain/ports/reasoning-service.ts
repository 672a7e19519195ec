import type { Result } from '@shared/lib/result.js';

/** What a reasoning request is for. Adapters may log it; stages route on it. */
export type ReasoningPurpose = 'triage' | 'research' | 'narrative';

export interface PromptSpec {
  purpose: ReasoningPurpose;
  /** Role and rules for the model. */
  system: string;
  /** The task itself, including any log excerpt or search results. */
  user: string;
}

/**
 * Expected shape of the answer.
 * - `json`: a single JSON object; `fields` names each key and what it holds
 * - `text`: free prose, returned as a string
 */
export type ShapeSpec =
  | { format: 'json'; fields: Readonly<Record<string, string>> }
  | { format: 'text' };

export interface ReasoningRequest {
  prompt: PromptSpec;
  shape: ShapeSpec;
}

/** Any JSON value. Stages coerce it; adapters never validate beyond parsing. */
export type StructuredValue =
  | string
  | number
  | boolean
  | null
  | StructuredValue[]
  | { [key: string]: StructuredValue };

export type ServiceErrorKind = 'unavailable' | 'timeout' | 'malformed';

export interface ServiceError {
  kind: ServiceErrorKind;
  message: string;
}

export type ServiceResult<T> = Result<T, ServiceError>;

export interface ServiceCallOptions {
  /** Fires on the per-call deadline or on cancellation of the analysis. */
  signal: AbortSignal;
  timeoutMs: number;
}

/**
 * Port interface for the natural-language reasoning service.
 *
 * Implementations are shared, read-only handles: several analyses may call
 * the same instance concurrently. Expected failures come back as a
 * `ServiceError`; a thrown exception is treated as `unavailable`.
 */
export interface IReasoningService {
  /** Human-readable name (e.g. 'anthropic', 'claude-cli', 'scripted'). */
  readonly name: string;
  call(request: ReasoningRequest, options: ServiceCallOptions): Promise<ServiceResult<StructuredValue>>;
}
