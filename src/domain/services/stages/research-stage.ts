import type { ICodeContextSource } from '@domain/ports/code-context-source.js';
import type { IReasoningService, StructuredValue } from '@domain/ports/reasoning-service.js';
import type { ISearchService } from '@domain/ports/search-service.js';
import type { AnalysisState } from '@domain/types/analysis-state.js';
import { INSUFFICIENT_LOG_ERROR_TYPE, type ErrorClassification } from '@domain/types/classification.js';
import type { RepoContext } from '@domain/types/code-context.js';
import { SEARCH_INDEPENDENT_MARKER, type FixCandidate } from '@domain/types/fix-candidate.js';
import type { SearchHit } from '@domain/types/search.js';
import { clampConfidence, coerceStringList, coerceText, isRecord } from '@domain/rules/coercion-rules.js';
import { rankCandidates } from '@domain/rules/ranking-rules.js';
import { err, ok } from '@shared/lib/result.js';
import { sliceHead } from '@shared/lib/text.js';
import { buildResearchRequest } from './prompts.js';
import { callService, type StageContext, type StageError, type StageResult } from './stage-context.js';

export const MAX_RELEVANT_LINKS = 5;
export const TRIAGE_SUGGESTION_CONFIDENCE = 0.7;
const MIN_QUERY_LENGTH = 10;
const QUERY_MESSAGE_LENGTH = 60;

export interface ResearchServices {
  reasoning: IReasoningService;
  search: ISearchService;
  /** Set when the failing repository is known. */
  codeContext?: ICodeContextSource;
}

export interface ResearchFindings {
  /** Ranked and capped. */
  candidates: FixCandidate[];
  relevantLinks: string[];
  searchHitCount: number;
  /** One entry per search, or context fetch, that failed and was skipped. */
  warnings: string[];
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Search queries for a classification, in priority order:
 *   1. the queries triage proposed, as given
 *   2. "<errorType> <message> fix"
 *   3. "CI build <category> <errorType> solution"
 * Quotes are removed from the message, whitespace is collapsed, and queries
 * that repeat (ignoring case) or are too short to be useful are dropped.
 */
export function buildSearchQueries(classification: ErrorClassification, maxQueries: number): string[] {
  const message = sliceHead(classification.message.replace(/["'`]/g, ''), QUERY_MESSAGE_LENGTH);
  const category = classification.category.replace(/_/g, ' ');
  const drafts = [
    ...(classification.researchQueries ?? []),
    `${classification.errorType} ${message} fix`,
    `CI build ${category} ${classification.errorType} solution`,
  ];

  const seen = new Set<string>();
  const queries: string[] = [];
  for (const draft of drafts) {
    const query = draft.replace(/\s+/g, ' ').trim();
    const key = query.toLowerCase();
    if (query.length < MIN_QUERY_LENGTH || seen.has(key)) continue;
    seen.add(key);
    queries.push(query);
  }
  return queries.slice(0, maxQueries);
}

function dedupeHits(hits: readonly SearchHit[]): SearchHit[] {
  const byUrl = new Map<string, SearchHit>();
  for (const hit of hits) {
    if (!byUrl.has(hit.url)) byUrl.set(hit.url, hit);
  }
  return [...byUrl.values()];
}

// ---------------------------------------------------------------------------
// Candidate coercion
// ---------------------------------------------------------------------------

function candidateEntries(value: StructuredValue): unknown[] | undefined {
  if (Array.isArray(value)) return value;
  if (!isRecord(value)) return undefined;
  for (const key of ['candidates', 'fixes', 'solutions']) {
    const entries = value[key];
    if (Array.isArray(entries)) return entries;
  }
  return [];
}

function markIndependent(rationale: string): string {
  return `${SEARCH_INDEPENDENT_MARKER} ${rationale}`.trimEnd();
}

/**
 * Coerce the research answer into candidates, in the order the service gave
 * them. Returns undefined when the answer holds no list at all.
 */
export function coerceCandidates(value: StructuredValue, searchIndependent: boolean): FixCandidate[] | undefined {
  const entries = candidateEntries(value);
  if (!entries) return undefined;

  const candidates: FixCandidate[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const rationale = coerceText(entry['rationale'], coerceText(entry['description']));
    const candidate: FixCandidate = {
      title: coerceText(entry['title'], `Fix ${candidates.length + 1}`),
      confidence: clampConfidence(entry['confidence']),
      rationale: searchIndependent ? markIndependent(rationale) : rationale,
      steps: coerceStringList(entry['steps'] ?? entry['implementationSteps']),
      source: searchIndependent ? 'general-knowledge' : 'web-research',
      searchIndependent,
    };
    const codeExample = coerceText(entry['codeExample']);
    if (codeExample !== '') candidate.codeExample = codeExample;
    candidates.push(candidate);
  }
  return candidates;
}

/** Turn triage suggestions into candidates when research produced none. */
export function candidatesFromSuggestions(suggestions: readonly string[], searchIndependent: boolean): FixCandidate[] {
  return suggestions.map((suggestion): FixCandidate => {
    const rationale = 'Suggested during triage.';
    return {
      title: suggestion,
      confidence: TRIAGE_SUGGESTION_CONFIDENCE,
      rationale: searchIndependent ? markIndependent(rationale) : rationale,
      steps: [suggestion],
      source: 'triage',
      searchIndependent,
    };
  });
}

// ---------------------------------------------------------------------------
// Stage
// ---------------------------------------------------------------------------

/**
 * Search for remediation knowledge and distill it into ranked fix candidates.
 *
 * Search failures count as zero results. With zero results the reasoning
 * service answers from general knowledge and every candidate is marked
 * search-independent. Repository context, when a source is given, is read
 * once and quoted in the request; failing to read it only adds a warning.
 * Reasoning failures fail the stage.
 */
export async function research(
  state: Readonly<AnalysisState>,
  services: ResearchServices,
  ctx: StageContext,
): Promise<StageResult<ResearchFindings>> {
  const classification = state.classification;
  if (!classification) {
    return err<StageError>({ reason: 'malformed-response', detail: 'research: no classification to research' });
  }
  if (classification.errorType === INSUFFICIENT_LOG_ERROR_TYPE) {
    ctx.log.debug('Nothing to research for an empty log');
    return ok({ candidates: [], relevantLinks: [], searchHitCount: 0, warnings: [] });
  }

  const { maxQueries, maxSearchResults, maxCandidates } = ctx.options;
  const collected: SearchHit[] = [];
  const answers: string[] = [];
  const warnings: string[] = [];
  for (const query of buildSearchQueries(classification, maxQueries)) {
    const found = await callService(ctx, `search "${query}"`, (options) =>
      services.search.search(query, maxSearchResults, options),
    );
    if (found.ok) {
      collected.push(...found.value.hits);
      const answer = found.value.answer;
      if (answer && !answers.includes(answer)) answers.push(answer);
      continue;
    }
    if (found.error.reason === 'cancelled') return found;
    ctx.log.warn('Search failed, continuing without its results', { query, detail: found.error.detail });
    warnings.push(`Search failed, continued without its results: ${found.error.detail}`);
  }

  const hits = dedupeHits(collected);
  const searchIndependent = hits.length === 0 && answers.length === 0;
  ctx.log.debug('Search complete', { hits: hits.length, answers: answers.length });

  let repoContext: RepoContext | undefined;
  const source = services.codeContext;
  if (source) {
    const fetched = await callService(ctx, 'repository context', (options) => source.fetch(options));
    if (fetched.ok) {
      repoContext = fetched.value;
    } else {
      if (fetched.error.reason === 'cancelled') return fetched;
      ctx.log.warn('Repository context unavailable, continuing without it', { detail: fetched.error.detail });
      warnings.push(`Repository context unavailable, continued without it: ${fetched.error.detail}`);
    }
  }

  const request = buildResearchRequest(
    classification,
    { hits, answers, ...(repoContext ? { repoContext } : {}) },
    maxCandidates,
  );
  const answer = await callService(ctx, 'research', (options) => services.reasoning.call(request, options));
  if (!answer.ok) return answer;

  const coerced = coerceCandidates(answer.value, searchIndependent);
  if (!coerced) {
    return err<StageError>({ reason: 'malformed-response', detail: 'research: answer holds no candidate list' });
  }
  const candidates = coerced.length > 0
    ? coerced
    : candidatesFromSuggestions(classification.suggestions, searchIndependent);

  return ok({
    candidates: rankCandidates(candidates, maxCandidates),
    relevantLinks: hits.slice(0, MAX_RELEVANT_LINKS).map((hit) => hit.url),
    searchHitCount: hits.length,
    warnings,
  });
}
