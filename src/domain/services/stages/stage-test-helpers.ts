import type { AnalysisState } from '@domain/types/analysis-state.js';
import type { ErrorClassification } from '@domain/types/classification.js';
import { AnalyzeOptionsSchema, type AnalyzeOptionsInput } from '@domain/types/config.js';
import type { Logger } from '@shared/lib/logger.js';
import type { StageContext } from './stage-context.js';

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

export function makeContext(overrides: AnalyzeOptionsInput = {}, signal = new AbortController().signal): StageContext {
  return { options: AnalyzeOptionsSchema.parse(overrides), signal, log: silentLogger };
}

export function makeClassification(overrides?: Partial<ErrorClassification>): ErrorClassification {
  return {
    errorType: 'TypeError',
    category: 'type_error',
    severity: 'high',
    message: "Cannot read properties of undefined (reading 'map')",
    affectedResources: ['src/list.ts'],
    rootCause: 'items is undefined when the list renders.',
    suggestions: ['Default items to an empty array'],
    ...overrides,
  };
}

export function makeState(overrides?: Partial<AnalysisState>): AnalysisState {
  return {
    id: 'a1b2c3d4-e5f6-7890-abcd-ef1234567890',
    startedAt: '2026-01-01T00:00:00.000Z',
    sourceLog: "TypeError: Cannot read properties of undefined (reading 'map')",
    fixCandidates: [],
    relevantLinks: [],
    stageHistory: [],
    warnings: [],
    status: 'triaging',
    ...overrides,
  };
}
