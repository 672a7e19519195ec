import { describe, it, expect } from 'vitest';
import { fallbackNarrative, synthesize } from './synthesis-stage.js';
import { makeClassification, makeContext, makeState } from './stage-test-helpers.js';
import { ScriptedReasoningService, failure, reply } from '@infra/reasoning/scripted-reasoning-service.js';
import type { FixCandidate } from '@domain/types/fix-candidate.js';

const topFix: FixCandidate = {
  title: 'Default items to an empty array',
  confidence: 0.8,
  rationale: 'items is undefined on first render.',
  steps: ['Use items ?? []'],
  source: 'web-research',
  searchIndependent: false,
};

const state = makeState({
  status: 'synthesizing',
  classification: makeClassification(),
  fixCandidates: [topFix],
});

describe('synthesize', () => {
  it('scores the analysis and returns the narrative', async () => {
    const reasoning = new ScriptedReasoningService({ narrative: [reply('  TypeError: default items to an empty array.  ')] });
    const result = await synthesize(state, reasoning, makeContext());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.narrative).toBe('TypeError: default items to an empty array.');
    expect(result.value.overallConfidence).toBeCloseTo(0.86);
    expect(result.value.requiredPhrases).toEqual(['TypeError', 'Default items to an empty array']);
  });

  it('applies configured confidence weights', async () => {
    const reasoning = new ScriptedReasoningService({ narrative: [reply('x')] });
    const result = await synthesize(state, reasoning, makeContext({ confidenceWeights: { top: 0.5, triage: 0.5 } }));
    expect(result.ok && result.value.overallConfidence).toBeCloseTo(0.9);
  });

  it('accepts a narrative wrapped in an object', async () => {
    const reasoning = new ScriptedReasoningService({ narrative: [reply({ narrative: 'Wrapped.' })] });
    const result = await synthesize(state, reasoning, makeContext());
    expect(result.ok && result.value.narrative).toBe('Wrapped.');
  });

  it('replaces an empty narrative with the fallback', async () => {
    const reasoning = new ScriptedReasoningService({ narrative: [reply('   ')] });
    const result = await synthesize(state, reasoning, makeContext());
    expect(result.ok && result.value.narrative).toBe(
      'The build failed with TypeError: items is undefined when the list renders. ' +
        'Start with "Default items to an empty array".',
    );
  });

  it('asks for a stricter draft when regenerating', async () => {
    const reasoning = new ScriptedReasoningService({ narrative: [reply('x')] });
    await synthesize(state, reasoning, { ...makeContext(), regenerate: true });
    expect(reasoning.calls[0]?.prompt.user).toContain('Your previous draft left out a required phrase.');
    expect(reasoning.calls[0]?.shape).toEqual({ format: 'text' });
  });

  it('reports a numeric answer as malformed', async () => {
    const reasoning = new ScriptedReasoningService({ narrative: [reply(7)] });
    const result = await synthesize(state, reasoning, makeContext());
    expect(result.ok ? undefined : result.error.reason).toBe('malformed-response');
  });

  it('passes service failures through', async () => {
    const reasoning = new ScriptedReasoningService({ narrative: [failure('timeout')] });
    const result = await synthesize(state, reasoning, makeContext());
    expect(result.ok ? undefined : result.error.reason).toBe('timeout');
  });
});

describe('fallbackNarrative', () => {
  it('uses the message when there is no root cause', () => {
    const text = fallbackNarrative(makeClassification({ rootCause: '', message: 'boom' }), undefined);
    expect(text).toBe('The build failed with TypeError: boom. No fix could be proposed from the available information.');
  });
});
