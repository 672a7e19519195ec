import { describe, it, expect } from 'vitest';
import { AnalysisFailureSchema, DebuggingBriefSchema } from './brief.js';
import { AnalysisStateSchema, ANALYSIS_STATUS_ORDER } from './analysis-state.js';

const VALID_UUID = 'a1b2c3d4-e5f6-7890-abcd-ef1234567890';
const VALID_TS = '2026-01-01T00:00:00.000Z';

const classification = {
  errorType: 'SyntaxError',
  category: 'syntax_error',
  severity: 'high',
  message: 'missing ) after argument list',
  affectedResources: [],
  rootCause: 'Unbalanced parenthesis',
  suggestions: [],
};

const state = {
  id: VALID_UUID,
  startedAt: VALID_TS,
  sourceLog: 'SyntaxError: missing ) after argument list',
  fixCandidates: [],
  relevantLinks: [],
  stageHistory: [],
  warnings: [],
  status: 'pending',
};

describe('AnalysisStateSchema', () => {
  it('parses a fresh state without classification', () => {
    expect(AnalysisStateSchema.safeParse(state).success).toBe(true);
  });

  it('rejects a non-uuid id', () => {
    expect(AnalysisStateSchema.safeParse({ ...state, id: 'run-1' }).success).toBe(false);
  });

  it('orders statuses forward and leaves failed out', () => {
    expect(ANALYSIS_STATUS_ORDER).toEqual(['pending', 'triaging', 'researching', 'synthesizing', 'complete']);
  });
});

describe('DebuggingBriefSchema', () => {
  const brief = {
    id: VALID_UUID,
    classification,
    fixCandidates: [
      {
        title: 'Close the parenthesis',
        confidence: 0.95,
        rationale: 'The call on line 3 is never closed',
        steps: ['Add ) at the end of line 3'],
        source: 'web-research',
        searchIndependent: false,
      },
    ],
    noFixesFound: false,
    overallConfidence: 0.965,
    narrative: 'SyntaxError caused by an unclosed call. Close the parenthesis.',
    narrativeDegraded: false,
    relevantLinks: ['https://example.com/syntax'],
    warnings: [],
    stageHistory: [
      {
        stageName: 'triage',
        status: 'triaging',
        startedAt: VALID_TS,
        finishedAt: VALID_TS,
        succeeded: true,
        retryCount: 0,
      },
    ],
    generatedAt: VALID_TS,
    analysisDurationMs: 1200,
  };

  it('parses a complete brief', () => {
    expect(DebuggingBriefSchema.safeParse(brief).success).toBe(true);
  });

  it('defaults searchHitCount to zero for briefs saved without it', () => {
    const parsed = DebuggingBriefSchema.parse(brief);
    expect(parsed.searchHitCount).toBe(0);
  });

  it('rejects a negative searchHitCount', () => {
    expect(DebuggingBriefSchema.safeParse({ ...brief, searchHitCount: -1 }).success).toBe(false);
  });

  it('rejects overallConfidence above 1', () => {
    expect(DebuggingBriefSchema.safeParse({ ...brief, overallConfidence: 1.2 }).success).toBe(false);
  });

  it('rejects an unknown candidate source', () => {
    const bad = { ...brief, fixCandidates: [{ ...brief.fixCandidates[0], source: 'oracle' }] };
    expect(DebuggingBriefSchema.safeParse(bad).success).toBe(false);
  });
});

describe('AnalysisFailureSchema', () => {
  it('parses a cancellation with partial state', () => {
    const result = AnalysisFailureSchema.safeParse({
      failedStage: 'research',
      reason: 'cancelled',
      message: 'Analysis cancelled',
      partialState: { ...state, status: 'failed', classification },
    });
    expect(result.success).toBe(true);
  });

  it('accepts normalization as a failed stage', () => {
    const result = AnalysisFailureSchema.safeParse({
      failedStage: 'normalization',
      reason: 'input-too-large',
      message: 'too big',
      partialState: { ...state, status: 'failed' },
    });
    expect(result.success).toBe(true);
  });

  it('rejects an unknown reason', () => {
    const result = AnalysisFailureSchema.safeParse({
      failedStage: 'triage',
      reason: 'gremlins',
      message: '',
      partialState: state,
    });
    expect(result.success).toBe(false);
  });
});
