import type { ReasoningRequest } from '@domain/ports/reasoning-service.js';
import type { ErrorClassification } from '@domain/types/classification.js';
import { ErrorCategorySchema } from '@domain/types/classification.js';
import type { RepoContext, RepoFile } from '@domain/types/code-context.js';
import type { FixCandidate } from '@domain/types/fix-candidate.js';
import type { SearchHit } from '@domain/types/search.js';
import { sliceHead } from '@shared/lib/text.js';

// ---------------------------------------------------------------------------
// Triage
// ---------------------------------------------------------------------------

const TRIAGE_SYSTEM = `You are a CI/CD debugging assistant. You read build logs and diagnose why the build failed.
Find the root cause, not the symptom. Judge severity by impact on the team:
critical blocks every build, high blocks this change, medium is a contained failure, low is noise or a flaky check.
Answer with a single JSON object and nothing else.`;

export function buildTriageRequest(sourceLog: string): ReasoningRequest {
  const categories = ErrorCategorySchema.options.join(', ');
  return {
    prompt: {
      purpose: 'triage',
      system: TRIAGE_SYSTEM,
      user: [
        'Classify this CI build failure.',
        '',
        '## Build log excerpt',
        '```',
        sourceLog,
        '```',
        '',
        `Use one of these categories: ${categories}.`,
      ].join('\n'),
    },
    shape: {
      format: 'json',
      fields: {
        errorType: 'error class or label as printed, e.g. "SyntaxError"',
        category: 'one category from the list',
        severity: 'critical | high | medium | low',
        message: 'the literal error message from the log',
        affectedResources: 'array of file paths or config keys involved',
        rootCause: 'one sentence root cause',
        suggestions: 'array of up to three immediate fix suggestions',
        researchQueries: 'array of up to three web search queries likely to find a fix',
      },
    },
  };
}

// ---------------------------------------------------------------------------
// Research
// ---------------------------------------------------------------------------

const RESEARCH_SYSTEM = `You are a CI/CD debugging expert. Propose concrete, ranked fixes for a diagnosed build failure.
Each fix needs a short title, a rationale, ordered steps and, when it helps, a command or code example.
Give each fix a confidence between 0 and 1 that it resolves the failure.
Answer with a single JSON object and nothing else.`;

function describeClassification(c: ErrorClassification): string {
  return [
    `- Type: ${c.errorType}`,
    `- Category: ${c.category}`,
    `- Severity: ${c.severity}`,
    `- Message: ${c.message}`,
    `- Root cause: ${c.rootCause || 'not determined'}`,
    `- Affected: ${c.affectedResources.length > 0 ? c.affectedResources.join(', ') : 'none identified'}`,
  ].join('\n');
}

function describeHits(hits: readonly SearchHit[]): string {
  return hits
    .map((hit, i) => `${i + 1}. ${hit.title}\n   ${hit.url}\n   ${hit.snippet}`)
    .join('\n');
}

/** Per-kind limits on repository files quoted in the research prompt. */
const REPO_FILES_PER_KIND = 2;
const MANIFEST_EXCERPT_LENGTH = 800;
const WORKFLOW_EXCERPT_LENGTH = 600;

function quoteFiles(files: readonly RepoFile[], excerptLength: number): string[] {
  return files.slice(0, REPO_FILES_PER_KIND).flatMap((file) => [
    `### ${file.path}`,
    '```',
    sliceHead(file.content, excerptLength).replace(/`/g, "'"),
    '```',
  ]);
}

function describeRepoContext(context: RepoContext): string[] {
  const lines = [`## Repository ${context.repository}`];
  if (context.manifests.length === 0 && context.workflows.length === 0) {
    return [...lines, 'No dependency manifest or workflow file was found.', ''];
  }
  return [
    ...lines,
    ...quoteFiles(context.manifests, MANIFEST_EXCERPT_LENGTH),
    ...quoteFiles(context.workflows, WORKFLOW_EXCERPT_LENGTH),
    '',
  ];
}

/** What research found to reason over. */
export interface ResearchEvidence {
  hits: readonly SearchHit[];
  /** Summary answers from the search provider, one per query that had one. */
  answers: readonly string[];
  repoContext?: RepoContext;
}

export function buildResearchRequest(
  classification: ErrorClassification,
  evidence: ResearchEvidence,
  maxCandidates: number,
): ReasoningRequest {
  const { hits, answers, repoContext } = evidence;
  const findings: string[] = [];
  if (answers.length > 0) {
    findings.push('## Search summaries', ...answers.map((answer) => `- ${answer}`), '');
  }
  if (hits.length > 0) {
    findings.push('## Web search results', describeHits(hits), '');
  }
  findings.push(findings.length > 0
    ? 'Base the fixes on these results where they apply.'
    : 'No web search results are available. Answer from general knowledge alone.');
  return {
    prompt: {
      purpose: 'research',
      system: RESEARCH_SYSTEM,
      user: [
        '## Error',
        describeClassification(classification),
        '',
        ...(repoContext ? describeRepoContext(repoContext) : []),
        ...findings,
        '',
        `Propose at most ${maxCandidates} fixes, most likely first.`,
      ].join('\n'),
    },
    shape: {
      format: 'json',
      fields: {
        candidates:
          'array of { "title": string, "confidence": number 0-1, "rationale": string, "steps": string[], "codeExample": string or null }',
      },
    },
  };
}

// ---------------------------------------------------------------------------
// Narrative
// ---------------------------------------------------------------------------

const NARRATIVE_SYSTEM = `You write the summary paragraph of a debugging brief for a developer whose build just failed.
Be specific and short: what failed, why, and what to do first. Plain prose, no headings, no lists.`;

export function buildNarrativeRequest(
  classification: ErrorClassification,
  topFix: FixCandidate | undefined,
  regenerate: boolean,
): ReasoningRequest {
  const required = topFix
    ? `Mention the error type "${classification.errorType}" and the fix "${topFix.title}" word for word.`
    : `Mention the error type "${classification.errorType}" word for word and say that no fix could be proposed.`;
  const lines = [
    '## Diagnosis',
    describeClassification(classification),
    '',
    topFix ? `## Recommended fix\n${topFix.title}: ${topFix.rationale}` : '## Recommended fix\nNone found.',
    '',
    'Write three to five sentences.',
    required,
  ];
  if (regenerate) {
    lines.push('Your previous draft left out a required phrase. Include every required phrase exactly as written.');
  }
  return {
    prompt: { purpose: 'narrative', system: NARRATIVE_SYSTEM, user: lines.join('\n') },
    shape: { format: 'text' },
  };
}
