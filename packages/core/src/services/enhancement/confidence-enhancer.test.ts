import { describe, it, expect, vi } from 'vitest';
import type { GlossaryRecord } from '@gleaner/shared/src/types/semantic.types.js';
import { compareConfidence } from '@gleaner/shared/src/utils/confidence.js';
import { LlmError } from '@gleaner/shared/src/utils/errors.js';
import {
  createFailingTextClient,
  createRespondingTextClient,
  glossaryRecord,
} from '../../test-helpers.js';
import { enhanceGlossary, needsReevaluation } from './confidence-enhancer.js';

const slo = glossaryRecord({ term: 'SLO', confidence: 'low', needsReview: true });
const edge = glossaryRecord({ term: 'Edge', confidence: 'medium', needsReview: true });
const api = glossaryRecord({ term: 'API', confidence: 'high' });
const cdn = glossaryRecord({ term: 'CDN', confidence: 'medium' });

describe('needsReevaluation', () => {
  it('should select terms at or below the threshold or flagged for review', () => {
    expect(needsReevaluation(slo, 'low')).toBe(true);
    expect(needsReevaluation(edge, 'low')).toBe(true);
    expect(needsReevaluation(cdn, 'low')).toBe(false);
    expect(needsReevaluation(cdn, 'medium')).toBe(true);
    expect(needsReevaluation(api, 'medium')).toBe(false);
  });
});

describe('enhanceGlossary', () => {
  it('should return trusted input unchanged without calling the text service', async () => {
    const client = createRespondingTextClient({ terms: [] });

    const result = await enhanceGlossary([api, cdn], client, 'Platform team');

    expect(result).toEqual([api, cdn]);
    expect(client.generateJson).not.toHaveBeenCalled();
  });

  it('should send every term under review in one request', async () => {
    const client = createRespondingTextClient({ terms: [] });

    await enhanceGlossary([slo, api, edge], client, 'Platform team glossary');

    expect(client.generateJson).toHaveBeenCalledTimes(1);
    const [prompt] = vi.mocked(client.generateJson).mock.calls[0];
    expect(prompt.split('\n')[0]).toBe('TASK: glossary-review');
    expect(prompt).toContain('Platform team glossary');
    expect(prompt).toContain('- SLO (confidence: low): SLO definition');
    expect(prompt).toContain('- Edge (confidence: medium): Edge definition');
    expect(prompt).not.toContain('- API (confidence');
  });

  it('should replace a term when the new confidence is strictly higher', async () => {
    const client = createRespondingTextClient({
      terms: [
        {
          term: 'slo',
          definition: 'Service level objective',
          category: 'operations',
          confidence: 'high',
          keywords: ['reliability'],
        },
      ],
    });

    const [result] = await enhanceGlossary([slo], client, '');

    expect(result).toEqual({
      kind: 'glossary',
      payload: {
        term: 'SLO',
        definition: 'Service level objective',
        termCategory: 'operations',
        confidence: 'high',
        needsReview: false,
        alternativeDefinitions: ['SLO definition'],
      },
      keywords: ['SLO', 'reliability'],
      provenance: slo.provenance,
      metadata: { strategy: 'section-glossary', enhancedBy: 'glossary-enhancement' },
    });
  });

  it('should keep the original on equal confidence and record the alternatives', async () => {
    const client = createRespondingTextClient({
      terms: [
        {
          term: 'Edge',
          definition: 'The CDN layer',
          confidence: 'medium',
          alternative_definitions: ['The browser', 'Edge definition'],
        },
      ],
    });

    const [result] = await enhanceGlossary([edge], client, '');

    expect(result.payload).toEqual({
      term: 'Edge',
      definition: 'Edge definition',
      termCategory: 'other',
      confidence: 'medium',
      needsReview: true,
      alternativeDefinitions: ['The CDN layer', 'The browser'],
    });
  });

  it('should keep the domain hints of a replaced term', async () => {
    const scoped = glossaryRecord({
      term: 'SLO',
      confidence: 'low',
      needsReview: true,
      domainHints: ['platform', 'sre'],
    });
    const client = createRespondingTextClient({
      terms: [
        {
          term: 'SLO',
          definition: 'Service level objective',
          confidence: 'high',
          domain_hints: ['sre', 'observability'],
        },
      ],
    });

    const [result] = await enhanceGlossary([scoped], client, '');

    expect(result.payload.definition).toBe('Service level objective');
    expect(result.payload.domainHints).toEqual(['platform', 'sre', 'observability']);
  });

  it('should take in the domain hints and keywords of a losing candidate', async () => {
    const scoped = glossaryRecord({
      term: 'Edge',
      confidence: 'medium',
      needsReview: true,
      domainHints: ['cdn'],
    });
    const client = createRespondingTextClient({
      terms: [
        {
          term: 'Edge',
          definition: 'The CDN layer',
          confidence: 'medium',
          domain_hints: ['network', 'cdn'],
          keywords: ['edge', 'Latency'],
        },
      ],
    });

    const [result] = await enhanceGlossary([scoped], client, '');

    expect(result.payload.definition).toBe('Edge definition');
    expect(result.payload.domainHints).toEqual(['cdn', 'network']);
    expect(result.keywords).toEqual(['Edge', 'Latency']);
  });

  it('should apply the valid answers when one reviewed term is malformed', async () => {
    const client = createRespondingTextClient({
      terms: [
        { term: 'SLO', definition: 'Service level objective', confidence: 'high' },
        { term: 'Edge', definition: null, confidence: 'high' },
      ],
    });

    const result = await enhanceGlossary([slo, edge], client, '');

    expect(result[0].payload).toMatchObject({
      term: 'SLO',
      definition: 'Service level objective',
      confidence: 'high',
    });
    expect(result[1]).toBe(edge);
  });

  it('should never lower confidence', async () => {
    const client = createRespondingTextClient({
      terms: [{ term: 'Edge', definition: 'Not sure', confidence: 'low' }],
    });

    const [result] = await enhanceGlossary([edge], client, '');

    expect(result.payload.confidence).toBe('medium');
    expect(result.payload.definition).toBe('Edge definition');
    expect(result.payload.alternativeDefinitions).toEqual(['Not sure']);
  });

  it('should keep unmentioned terms flagged for review', async () => {
    const client = createRespondingTextClient({ terms: [] });

    const result = await enhanceGlossary([cdn, api], client, '', 'medium');

    expect(result).toEqual([
      { ...cdn, payload: { ...cdn.payload, needsReview: true } },
      api,
    ]);
  });

  it('should append newly discovered terms after the input', async () => {
    const client = createRespondingTextClient({
      terms: [{ term: 'Error budget', definition: 'Allowed unreliability', confidence: 'high' }],
    });

    const result = await enhanceGlossary([api, slo], client, '');

    expect(result.map((record) => record.payload.term)).toEqual(['API', 'SLO', 'Error budget']);
    expect(result[2].provenance).toEqual({ origin: 'enhancement', reviewedTerms: ['SLO'] });
    expect(result[2].metadata).toEqual({ strategy: 'glossary-enhancement' });
  });

  it('should flag every reviewed term when the text service fails', async () => {
    const client = createFailingTextClient(new LlmError('mock invocation failed: 503', true));

    const result = await enhanceGlossary([slo, cdn, api], client, '', 'medium');

    expect(result).toEqual([
      slo,
      { ...cdn, payload: { ...cdn.payload, needsReview: true } },
      api,
    ]);
  });

  it('should uphold the low-confidence review rule and never drop a term', async () => {
    const lowButClear = glossaryRecord({ term: 'WIP', confidence: 'low', needsReview: true });
    const input: GlossaryRecord[] = [slo, edge, api, lowButClear];
    const client = createRespondingTextClient({
      terms: [
        { term: 'SLO', definition: 'Service level objective', confidence: 'medium' },
        { term: 'Edge', definition: 'Edge network', confidence: 'high' },
        { term: 'WIP', definition: 'Work in progress', confidence: 'low', needs_review: false },
        { term: 'Toil', definition: 'Manual repetitive work', confidence: 'low' },
      ],
    });

    const result = await enhanceGlossary(input, client, '');

    for (const record of result) {
      if (record.payload.confidence === 'low') {
        expect(record.payload.needsReview).toBe(true);
      }
    }
    for (const before of input) {
      const after = result.find((record) => record.payload.term === before.payload.term);
      expect(after).toBeDefined();
      if (after) {
        expect(compareConfidence(after.payload.confidence, before.payload.confidence)).toBeGreaterThanOrEqual(0);
      }
    }
    expect(result.map((record) => record.payload.term)).toEqual(['SLO', 'Edge', 'API', 'WIP', 'Toil']);
  });
});
