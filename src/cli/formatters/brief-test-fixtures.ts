import type { AnalysisFailure, DebuggingBrief } from '@domain/types/brief.js';

export function makeBrief(overrides: Partial<DebuggingBrief> = {}): DebuggingBrief {
  return {
    id: '3f2b8c1e-9d4a-4e6b-8a1c-2d3e4f5a6b7c',
    classification: {
      errorType: 'SyntaxError',
      category: 'syntax_error',
      severity: 'high',
      message: 'missing ) after argument list',
      affectedResources: ['build.js'],
      rootCause: 'A call in build.js is never closed.',
      suggestions: ['Close the call on line 3'],
    },
    fixCandidates: [
      {
        title: 'Add the missing closing parenthesis',
        confidence: 0.95,
        rationale: 'console.log on line 3 is never closed.',
        steps: ['Open build.js', 'Add ) after "done"'],
        codeExample: 'console.log("done");',
        source: 'web-research',
        searchIndependent: false,
      },
      {
        title: 'Run a linter',
        confidence: 0.4,
        rationale: 'A linter points at the exact token.',
        steps: [],
        source: 'web-research',
        searchIndependent: false,
      },
    ],
    noFixesFound: false,
    overallConfidence: 0.965,
    narrative: 'SyntaxError in build.js: add the missing closing parenthesis.',
    narrativeDegraded: false,
    relevantLinks: ['https://example.com/a'],
    searchHitCount: 2,
    warnings: [],
    stageHistory: [
      {
        stageName: 'triage',
        status: 'triaging',
        startedAt: '2026-01-01T00:00:00.000Z',
        finishedAt: '2026-01-01T00:00:01.000Z',
        succeeded: true,
        retryCount: 0,
      },
    ],
    generatedAt: '2026-01-01T00:00:02.000Z',
    analysisDurationMs: 2300,
    ...overrides,
  };
}

export function makeFailure(overrides: Partial<AnalysisFailure> = {}): AnalysisFailure {
  return {
    failedStage: 'research',
    reason: 'timeout',
    message: 'research: no answer within 30000ms',
    partialState: {
      id: '3f2b8c1e-9d4a-4e6b-8a1c-2d3e4f5a6b7c',
      startedAt: '2026-01-01T00:00:00.000Z',
      sourceLog: 'SyntaxError',
      fixCandidates: [],
      relevantLinks: [],
      stageHistory: [
        {
          stageName: 'triage',
          status: 'triaging',
          startedAt: '2026-01-01T00:00:00.000Z',
          finishedAt: '2026-01-01T00:00:01.000Z',
          succeeded: true,
          retryCount: 0,
        },
        {
          stageName: 'research',
          status: 'researching',
          startedAt: '2026-01-01T00:00:01.000Z',
          finishedAt: '2026-01-01T00:01:31.000Z',
          succeeded: false,
          errorDetail: 'research: no answer within 30000ms',
          retryCount: 2,
        },
      ],
      warnings: ['Search failed for "SyntaxError fix": Tavily did not answer within 30000ms'],
      status: 'failed',
    },
    ...overrides,
  };
}
