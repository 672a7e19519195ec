import { strip } from '@shared/lib/ansi.js';
import {
  confidenceBar,
  formatBriefMarkdown,
  formatBriefSummary,
  formatDuration,
  formatFailure,
  percent,
} from './brief-formatter.js';
import { makeBrief, makeFailure } from './brief-test-fixtures.js';

describe('confidenceBar', () => {
  it('fills one cell per ten percent, rounded', () => {
    expect(confidenceBar(0)).toBe('░░░░░░░░░░');
    expect(confidenceBar(0.95)).toBe('██████████');
    expect(confidenceBar(0.44)).toBe('████░░░░░░');
    expect(confidenceBar(1)).toBe('██████████');
  });
});

describe('percent / formatDuration', () => {
  it('rounds to whole percent', () => {
    expect(percent(0.965)).toBe('97%');
    expect(percent(0)).toBe('0%');
  });

  it('shows milliseconds under a second and seconds above', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(2300)).toBe('2.3s');
  });
});

describe('formatBriefMarkdown', () => {
  it('renders every section of a complete brief', () => {
    const md = formatBriefMarkdown(makeBrief());
    const lines = md.split('\n');

    expect(lines[0]).toBe('# Debugging Brief: SyntaxError');
    expect(lines).toContain('**Severity:** high · **Category:** syntax_error · **Confidence:** 97%');
    expect(lines).toContain('| Message | missing ) after argument list |');
    expect(lines).toContain('SyntaxError in build.js: add the missing closing parenthesis.');
    expect(lines).toContain('- `build.js`');
    expect(lines).toContain('### 1. Add the missing closing parenthesis');
    expect(lines).toContain('Confidence: `██████████` 95% · Source: web research');
    expect(lines).toContain('2. Add ) after "done"');
    expect(md).toContain('```\nconsole.log("done");\n```');
    expect(lines).toContain('### 2. Run a linter');
    expect(lines).toContain('- https://example.com/a');
    expect(lines.at(-2)).toBe('_Overall confidence 97% · 2 search results · analysis took 2.3s · generated 2026-01-01T00:00:02.000Z_');
    expect(md.endsWith('\n')).toBe(true);
  });

  it('says so explicitly when there are no fixes', () => {
    const md = formatBriefMarkdown(makeBrief({ fixCandidates: [], noFixesFound: true }));
    expect(md).toContain('## Suggested Fixes\n\nNo fix candidates could be produced.\n');
    expect(md).not.toContain('### 1.');
  });

  it('escapes table pipes and flattens newlines', () => {
    const brief = makeBrief();
    const md = formatBriefMarkdown({
      ...brief,
      classification: { ...brief.classification, message: 'a | b\n  c', rootCause: '' },
    });
    expect(md).toContain('| Message | a \\| b c |');
    expect(md).toContain('| Root cause | - |');
  });

  it('flags a degraded narrative and lists warnings', () => {
    const md = formatBriefMarkdown(makeBrief({
      narrativeDegraded: true,
      warnings: ['Narrative does not mention "SyntaxError"; kept as degraded.'],
    }));
    expect(md).toContain('> This summary did not pass its content check and may be incomplete.');
    expect(md).toContain('## Warnings\n\n- Narrative does not mention "SyntaxError"; kept as degraded.\n');
  });

  it('counts a single search result in the singular', () => {
    const lines = formatBriefMarkdown(makeBrief({ searchHitCount: 1 })).split('\n');
    expect(lines.at(-2)).toBe('_Overall confidence 97% · 1 search result · analysis took 2.3s · generated 2026-01-01T00:00:02.000Z_');
  });

  it('omits empty optional sections', () => {
    const brief = makeBrief({ relevantLinks: [] });
    const md = formatBriefMarkdown({ ...brief, classification: { ...brief.classification, affectedResources: [] } });
    expect(md).not.toContain('## Helpful Links');
    expect(md).not.toContain('## Affected Resources');
    expect(md).not.toContain('## Warnings');
  });
});

describe('formatBriefSummary', () => {
  it('shows the error, fixes and confidence', () => {
    const lines = strip(formatBriefSummary(makeBrief())).split('\n');

    expect(lines[0]).toBe('SyntaxError (syntax_error, high)');
    expect(lines[1]).toBe('  missing ) after argument list');
    expect(lines[2]).toBe('Root cause: A call in build.js is never closed.');
    expect(lines).toContain('  1. Add the missing closing parenthesis ██████████ 95%');
    expect(lines).toContain('  2. Run a linter ████░░░░░░ 40%');
    expect(lines.at(-1)).toBe('Confidence: 97% (2.3s)');
  });

  it('reports when no fixes were found', () => {
    const out = strip(formatBriefSummary(makeBrief({ fixCandidates: [], noFixesFound: true })));
    expect(out).toContain('No fix candidates could be produced.');
    expect(out).not.toContain('Fixes:');
  });
});

describe('formatFailure', () => {
  it('shows stage, reason, message and history', () => {
    const lines = strip(formatFailure(makeFailure())).split('\n');

    expect(lines).toEqual([
      'Analysis failed during research (timeout)',
      '  research: no answer within 30000ms',
      '',
      'Stage history:',
      '  ✔ triage (0 retries)',
      '  ✖ research (2 retries): research: no answer within 30000ms',
      '! Search failed for "SyntaxError fix": Tavily did not answer within 30000ms',
    ]);
  });

  it('omits the history when nothing ran', () => {
    const failure = makeFailure();
    const out = strip(formatFailure({
      ...failure,
      failedStage: 'normalization',
      reason: 'input-too-large',
      message: 'Build log is 10 characters; the limit is 5',
      partialState: { ...failure.partialState, stageHistory: [], warnings: [] },
    }));
    expect(out).toBe('Analysis failed during normalization (input-too-large)\n  Build log is 10 characters; the limit is 5');
  });
});
