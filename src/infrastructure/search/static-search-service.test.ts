import { describe, it, expect } from 'vitest';
import { StaticSearchService } from './static-search-service.js';

const options = { signal: new AbortController().signal, timeoutMs: 1000 };
const hits = [
  { title: 'One', url: 'https://example.com/1', snippet: 'first' },
  { title: 'Two', url: 'https://example.com/2', snippet: 'second' },
];

describe('StaticSearchService', () => {
  it('is named "none" with nothing to return', () => {
    expect(new StaticSearchService().name).toBe('none');
    expect(new StaticSearchService({ hits }).name).toBe('static');
  });

  it('returns its hits capped at maxResults and records queries', async () => {
    const search = new StaticSearchService({ hits });

    const result = await search.search('first query', 1, options);

    expect(result).toEqual({ ok: true, value: { hits: [hits[0]] } });
    expect(search.queries).toEqual(['first query']);
  });

  it('adds its answer to every response', async () => {
    const search = new StaticSearchService({ hits, answer: 'Guard the value first.' });

    expect(await search.search('q', 5, options)).toEqual({
      ok: true,
      value: { hits, answer: 'Guard the value first.' },
    });
  });

  it('fails every query when told to', async () => {
    const search = new StaticSearchService({ failWith: { kind: 'unavailable', message: 'down' } });

    expect(await search.search('q', 5, options)).toEqual({ ok: false, error: { kind: 'unavailable', message: 'down' } });
  });
});
