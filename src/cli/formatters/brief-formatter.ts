import type { AnalysisFailure, DebuggingBrief } from '@domain/types/brief.js';
import type { FixCandidate, FixSource } from '@domain/types/fix-candidate.js';
import type { StageOutcome } from '@domain/types/analysis-state.js';
import { bold, cyan, dim, green, red, yellow } from '@shared/lib/ansi.js';

const BAR_CELLS = 10;

const SOURCE_LABEL: Record<FixSource, string> = {
  'web-research': 'web research',
  'general-knowledge': 'general knowledge',
  triage: 'triage',
};

export function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/** Ten-cell bar, one cell per 10% (rounded). */
export function confidenceBar(value: number): string {
  const filled = Math.min(BAR_CELLS, Math.max(0, Math.round(value * BAR_CELLS)));
  return '█'.repeat(filled) + '░'.repeat(BAR_CELLS - filled);
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ') || '-';
}

function formatFix(fix: FixCandidate, index: number): string[] {
  const lines = [
    `### ${index + 1}. ${fix.title}`,
    '',
    `Confidence: \`${confidenceBar(fix.confidence)}\` ${percent(fix.confidence)} · Source: ${SOURCE_LABEL[fix.source]}`,
  ];
  if (fix.rationale) lines.push('', fix.rationale);
  if (fix.steps.length > 0) {
    lines.push('', '**Steps**', '', ...fix.steps.map((step, i) => `${i + 1}. ${step}`));
  }
  if (fix.codeExample) lines.push('', '```', fix.codeExample, '```');
  lines.push('');
  return lines;
}

/**
 * Render a brief as a markdown document.
 */
export function formatBriefMarkdown(brief: DebuggingBrief): string {
  const c = brief.classification;
  const lines: string[] = [
    `# Debugging Brief: ${c.errorType}`,
    '',
    `**Severity:** ${c.severity} · **Category:** ${c.category} · **Confidence:** ${percent(brief.overallConfidence)}`,
    '',
    '## Error Summary',
    '',
    '| Field | Value |',
    '| --- | --- |',
    `| Error type | ${cell(c.errorType)} |`,
    `| Category | ${cell(c.category)} |`,
    `| Severity | ${cell(c.severity)} |`,
    `| Message | ${cell(c.message)} |`,
    `| Root cause | ${cell(c.rootCause)} |`,
    '',
    '## What Happened',
    '',
    brief.narrative,
    '',
  ];
  if (brief.narrativeDegraded) {
    lines.push('> This summary did not pass its content check and may be incomplete.', '');
  }

  if (c.affectedResources.length > 0) {
    lines.push('## Affected Resources', '', ...c.affectedResources.map((r) => `- \`${r}\``), '');
  }

  lines.push('## Suggested Fixes', '');
  if (brief.noFixesFound) {
    lines.push('No fix candidates could be produced.', '');
  } else {
    brief.fixCandidates.forEach((fix, i) => lines.push(...formatFix(fix, i)));
  }

  if (brief.relevantLinks.length > 0) {
    lines.push('## Helpful Links', '', ...brief.relevantLinks.map((url) => `- ${url}`), '');
  }
  if (brief.warnings.length > 0) {
    lines.push('## Warnings', '', ...brief.warnings.map((w) => `- ${w}`), '');
  }

  const hits = `${brief.searchHitCount} search ${brief.searchHitCount === 1 ? 'result' : 'results'}`;
  lines.push(
    '---',
    '',
    `_Overall confidence ${percent(brief.overallConfidence)} · ${hits} · analysis took ${formatDuration(brief.analysisDurationMs)} · generated ${brief.generatedAt}_`,
  );
  return lines.join('\n') + '\n';
}

function severityColor(severity: DebuggingBrief['classification']['severity']): (s: string) => string {
  if (severity === 'critical' || severity === 'high') return red;
  if (severity === 'medium') return yellow;
  return dim;
}

/**
 * Compact terminal view of a brief.
 */
export function formatBriefSummary(brief: DebuggingBrief): string {
  const c = brief.classification;
  const lines = [
    `${bold(c.errorType)} ${dim(`(${c.category}, `)}${severityColor(c.severity)(c.severity)}${dim(')')}`,
  ];
  if (c.message) lines.push(`  ${c.message}`);
  if (c.rootCause) lines.push(`${bold('Root cause:')} ${c.rootCause}`);
  lines.push('', brief.narrative, '');

  if (brief.noFixesFound) {
    lines.push(yellow('No fix candidates could be produced.'));
  } else {
    lines.push(bold('Fixes:'));
    brief.fixCandidates.forEach((fix, i) => {
      lines.push(`  ${i + 1}. ${cyan(fix.title)} ${dim(`${confidenceBar(fix.confidence)} ${percent(fix.confidence)}`)}`);
    });
  }

  for (const warning of brief.warnings) lines.push(yellow(`! ${warning}`));
  lines.push('', `${bold('Confidence:')} ${percent(brief.overallConfidence)} ${dim(`(${formatDuration(brief.analysisDurationMs)})`)}`);
  return lines.join('\n');
}

function formatOutcome(outcome: StageOutcome): string {
  const mark = outcome.succeeded ? green('✔') : red('✖');
  const retries = `${outcome.retryCount} ${outcome.retryCount === 1 ? 'retry' : 'retries'}`;
  const detail = outcome.errorDetail ? `: ${outcome.errorDetail}` : '';
  return `  ${mark} ${outcome.stageName} ${dim(`(${retries})`)}${detail}`;
}

/**
 * Describe a failed analysis: where it stopped, why, and the stages that ran.
 */
export function formatFailure(failure: AnalysisFailure): string {
  const lines = [
    red(bold(`Analysis failed during ${failure.failedStage} (${failure.reason})`)),
    `  ${failure.message}`,
  ];
  const history = failure.partialState.stageHistory;
  if (history.length > 0) {
    lines.push('', bold('Stage history:'), ...history.map(formatOutcome));
  }
  for (const warning of failure.partialState.warnings) lines.push(yellow(`! ${warning}`));
  return lines.join('\n');
}
