import { ANALYSIS_STATUS_ORDER, type AnalysisStatus } from '@domain/types/analysis-state.js';

export function isTerminalStatus(status: AnalysisStatus): boolean {
  return status === 'complete' || status === 'failed';
}

/**
 * Whether `from -> to` is a legal move: one step forward along
 * pending -> triaging -> researching -> synthesizing -> complete, or to
 * `failed` from any non-terminal status.
 */
export function canTransition(from: AnalysisStatus, to: AnalysisStatus): boolean {
  if (isTerminalStatus(from)) return false;
  if (to === 'failed') return true;
  return ANALYSIS_STATUS_ORDER.indexOf(to) === ANALYSIS_STATUS_ORDER.indexOf(from) + 1;
}
