import { describe, it, expect } from 'vitest';
import {
  buildSearchQueries,
  candidatesFromSuggestions,
  coerceCandidates,
  research,
} from './research-stage.js';
import { makeClassification, makeContext, makeState } from './stage-test-helpers.js';
import { ScriptedReasoningService, failure, reply } from '@infra/reasoning/scripted-reasoning-service.js';
import { StaticSearchService } from '@infra/search/static-search-service.js';
import type { ICodeContextSource } from '@domain/ports/code-context-source.js';
import type { ServiceError } from '@domain/ports/reasoning-service.js';
import type { RepoContext } from '@domain/types/code-context.js';
import type { SearchHit } from '@domain/types/search.js';
import { err, ok } from '@shared/lib/result.js';

function hit(n: number): SearchHit {
  return { title: `Result ${n}`, url: `https://example.com/${n}`, snippet: `Snippet ${n}` };
}

describe('buildSearchQueries', () => {
  it('derives two queries from type, message and category', () => {
    expect(buildSearchQueries(makeClassification(), 2)).toEqual([
      'TypeError Cannot read properties of undefined (reading map) fix',
      'CI build type error TypeError solution',
    ]);
  });

  it('truncates the message to 60 characters', () => {
    const message = 'x'.repeat(100);
    const [first] = buildSearchQueries(makeClassification({ message }), 2);
    expect(first).toBe(`TypeError ${'x'.repeat(60)} fix`);
  });

  it('does not split a surrogate pair at the 60 character cut', () => {
    const message = 'x'.repeat(59) + '\u{1F525} tail';
    const [first] = buildSearchQueries(makeClassification({ message }), 2);
    expect(first).toBe(`TypeError ${'x'.repeat(59)} fix`);
  });

  it('collapses whitespace', () => {
    const [first] = buildSearchQueries(makeClassification({ message: 'a\n\n   b\tc' }), 1);
    expect(first).toBe('TypeError a b c fix');
  });

  it('drops queries shorter than 10 characters', () => {
    const queries = buildSearchQueries(makeClassification({ errorType: 'E', message: '' }), 2);
    expect(queries).toEqual(['CI build type error E solution']);
  });

  it('caps at maxQueries', () => {
    expect(buildSearchQueries(makeClassification(), 1)).toHaveLength(1);
  });

  it('searches triage queries first under the same cleanup and cap', () => {
    const classification = makeClassification({ researchQueries: ['  react   list items undefined ', 'tiny'] });
    expect(buildSearchQueries(classification, 2)).toEqual([
      'react list items undefined',
      'TypeError Cannot read properties of undefined (reading map) fix',
    ]);
  });

  it('drops derived queries that repeat a triage query', () => {
    const classification = makeClassification({ researchQueries: ['ci build TYPE ERROR typeerror SOLUTION'] });
    expect(buildSearchQueries(classification, 3)).toEqual([
      'ci build TYPE ERROR typeerror SOLUTION',
      'TypeError Cannot read properties of undefined (reading map) fix',
    ]);
  });
});

describe('coerceCandidates', () => {
  it('reads candidates, fixes or solutions lists and bare arrays', () => {
    for (const key of ['candidates', 'fixes', 'solutions']) {
      expect(coerceCandidates({ [key]: [{ title: 'T', confidence: 0.5 }] }, false)).toHaveLength(1);
    }
    expect(coerceCandidates([{ title: 'T' }], false)).toHaveLength(1);
  });

  it('numbers untitled candidates', () => {
    const candidates = coerceCandidates({ candidates: [{ confidence: 0.3 }, 'skip', { title: 'Named' }, {}] }, false);
    expect(candidates?.map((c) => c.title)).toEqual(['Fix 1', 'Named', 'Fix 3']);
  });

  it('falls back to description for the rationale', () => {
    const [candidate] = coerceCandidates({ candidates: [{ title: 'T', description: 'Because.' }] }, false) ?? [];
    expect(candidate?.rationale).toBe('Because.');
  });

  it('marks search-independent candidates', () => {
    const [candidate] = coerceCandidates({ candidates: [{ title: 'T', rationale: 'Known issue.' }] }, true) ?? [];
    expect(candidate).toMatchObject({
      rationale: '[search-independent] Known issue.',
      source: 'general-knowledge',
      searchIndependent: true,
    });
  });

  it('reads implementation steps and skips an empty code example', () => {
    const [candidate] = coerceCandidates(
      { candidates: [{ title: 'T', implementationSteps: ['one', 2, 'two'], codeExample: '' }] },
      false,
    ) ?? [];
    expect(candidate?.steps).toEqual(['one', 'two']);
    expect(candidate).not.toHaveProperty('codeExample');
  });

  it('returns an empty list for an object without a list', () => {
    expect(coerceCandidates({ answer: 'none' }, false)).toEqual([]);
  });

  it('returns undefined for scalars', () => {
    expect(coerceCandidates('Install it', false)).toBeUndefined();
  });
});

describe('candidatesFromSuggestions', () => {
  it('builds triage candidates at 0.7', () => {
    expect(candidatesFromSuggestions(['Pin the version'], true)).toEqual([{
      title: 'Pin the version',
      confidence: 0.7,
      rationale: '[search-independent] Suggested during triage.',
      steps: ['Pin the version'],
      source: 'triage',
      searchIndependent: true,
    }]);
  });
});

describe('research', () => {
  const state = makeState({ status: 'researching', classification: makeClassification() });

  it('feeds search hits to the reasoning service', async () => {
    const reasoning = new ScriptedReasoningService({
      research: [reply({ candidates: [{ title: 'Default items', confidence: 0.8, rationale: 'r' }] })],
    });
    const search = new StaticSearchService({ hits: [hit(1), hit(2)] });
    const result = await research(state, { reasoning, search }, makeContext());

    expect(result.ok && result.value).toEqual({
      candidates: [{
        title: 'Default items',
        confidence: 0.8,
        rationale: 'r',
        steps: [],
        source: 'web-research',
        searchIndependent: false,
      }],
      relevantLinks: ['https://example.com/1', 'https://example.com/2'],
      searchHitCount: 2,
      warnings: [],
    });
    expect(reasoning.calls[0]?.prompt.user).toContain('1. Result 1\n   https://example.com/1\n   Snippet 1');
  });

  it('keeps the first five distinct links', async () => {
    const reasoning = new ScriptedReasoningService({ research: [reply({ candidates: [{ title: 'T' }] })] });
    const search = new StaticSearchService({ hits: [1, 2, 2, 3, 4, 5, 6, 7].map(hit) });
    const result = await research(state, { reasoning, search }, makeContext({ maxSearchResults: 10 }));
    expect(result.ok && result.value.relevantLinks).toEqual([1, 2, 3, 4, 5].map((n) => `https://example.com/${n}`));
    expect(result.ok && result.value.searchHitCount).toBe(7);
  });

  it('asks for at most maxSearchResults hits per query', async () => {
    const reasoning = new ScriptedReasoningService({ research: [reply({ candidates: [] })] });
    const search = new StaticSearchService({ hits: [1, 2, 3, 4].map(hit) });
    const result = await research(state, { reasoning, search }, makeContext({ maxSearchResults: 2 }));
    expect(result.ok && result.value.searchHitCount).toBe(2);
  });

  it('skips a failed search with a warning and answers from general knowledge', async () => {
    const reasoning = new ScriptedReasoningService({ research: [reply({ candidates: [] })] });
    const search = new StaticSearchService({ failWith: { kind: 'timeout', message: 'no answer' } });
    const result = await research(state, { reasoning, search }, makeContext({ maxQueries: 1 }));

    expect(result.ok && result.value.warnings).toEqual([
      'Search failed, continued without its results: ' +
        'search "TypeError Cannot read properties of undefined (reading map) fix": no answer',
    ]);
    expect(result.ok && result.value.candidates).toEqual([{
      title: 'Default items to an empty array',
      confidence: 0.7,
      rationale: '[search-independent] Suggested during triage.',
      steps: ['Default items to an empty array'],
      source: 'triage',
      searchIndependent: true,
    }]);
    expect(reasoning.calls[0]?.prompt.user).toContain('Answer from general knowledge alone.');
  });

  it('quotes provider answers once each and counts them as search evidence', async () => {
    const reasoning = new ScriptedReasoningService({ research: [reply({ candidates: [{ title: 'T', rationale: 'r' }] })] });
    const search = new StaticSearchService({ answer: 'Default items before mapping.' });
    const result = await research(state, { reasoning, search }, makeContext());

    const prompt = reasoning.calls[0]?.prompt.user ?? '';
    expect(prompt).toContain('## Search summaries\n- Default items before mapping.\n\nBase the fixes on these results');
    expect(prompt.split('Default items before mapping.')).toHaveLength(2);
    expect(result.ok && result.value.candidates[0]).toMatchObject({ source: 'web-research', searchIndependent: false });
    expect(result.ok && result.value.searchHitCount).toBe(0);
  });

  describe('with a repository context source', () => {
    const repo: RepoContext = {
      repository: 'octo/api',
      manifests: [{ path: 'package.json', content: '{ "name": "app" }', truncated: false }],
      workflows: [{ path: '.github/workflows/ci.yml', content: 'run: `npm test`', truncated: false }],
    };

    it('quotes manifests and workflows in the request', async () => {
      const reasoning = new ScriptedReasoningService({ research: [reply({ candidates: [{ title: 'T' }] })] });
      const codeContext: ICodeContextSource = { name: 'fake', fetch: async () => ok(repo) };
      const result = await research(state, { reasoning, search: new StaticSearchService(), codeContext }, makeContext());

      expect(result.ok).toBe(true);
      expect(reasoning.calls[0]?.prompt.user).toContain([
        '## Repository octo/api',
        '### package.json',
        '```',
        '{ "name": "app" }',
        '```',
        '### .github/workflows/ci.yml',
        '```',
        "run: 'npm test'",
        '```',
      ].join('\n'));
    });

    it('cuts quoted files to their excerpt length', async () => {
      const reasoning = new ScriptedReasoningService({ research: [reply({ candidates: [] })] });
      const long: RepoContext = {
        ...repo,
        manifests: [{ path: 'requirements.txt', content: 'a'.repeat(900), truncated: false }],
      };
      const codeContext: ICodeContextSource = { name: 'fake', fetch: async () => ok(long) };
      await research(state, { reasoning, search: new StaticSearchService(), codeContext }, makeContext());

      expect(reasoning.calls[0]?.prompt.user).toContain('```\n' + 'a'.repeat(800) + '\n```');
    });

    it('continues with a warning when the context cannot be read', async () => {
      const reasoning = new ScriptedReasoningService({ research: [reply({ candidates: [{ title: 'T' }] })] });
      const codeContext: ICodeContextSource = {
        name: 'fake',
        fetch: async () => err<ServiceError>({ kind: 'unavailable', message: 'Bad credentials' }),
      };
      const result = await research(state, { reasoning, search: new StaticSearchService(), codeContext }, makeContext());

      expect(result.ok && result.value.warnings).toEqual([
        'Repository context unavailable, continued without it: repository context: Bad credentials',
      ]);
      expect(reasoning.calls[0]?.prompt.user).not.toContain('## Repository');
    });
  });

  it('fails on a reasoning outage', async () => {
    const reasoning = new ScriptedReasoningService({ research: [failure('unavailable', 'HTTP 503')] });
    const result = await research(state, { reasoning, search: new StaticSearchService() }, makeContext());
    expect(result).toEqual({
      ok: false,
      error: { reason: 'service-unavailable', detail: 'research: HTTP 503' },
    });
  });

  it('reports an answer without any list as malformed', async () => {
    const reasoning = new ScriptedReasoningService({ research: [reply('Try reinstalling.')] });
    const result = await research(state, { reasoning, search: new StaticSearchService() }, makeContext());
    expect(result.ok ? undefined : result.error.reason).toBe('malformed-response');
  });

  it('skips both services for an empty log', async () => {
    const reasoning = new ScriptedReasoningService();
    const search = new StaticSearchService({ hits: [hit(1)] });
    const empty = makeState({
      sourceLog: '',
      classification: makeClassification({ errorType: 'InsufficientLogData', category: 'unknown' }),
    });
    const result = await research(empty, { reasoning, search }, makeContext());
    expect(result.ok && result.value).toEqual({ candidates: [], relevantLinks: [], searchHitCount: 0, warnings: [] });
    expect(reasoning.calls).toHaveLength(0);
    expect(search.queries).toEqual([]);
  });

  it('requires a classification', async () => {
    const result = await research(
      makeState(),
      { reasoning: new ScriptedReasoningService(), search: new StaticSearchService() },
      makeContext(),
    );
    expect(result.ok).toBe(false);
  });
});
