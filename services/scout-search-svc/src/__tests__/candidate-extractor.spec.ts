import { describe, expect, it } from 'vitest';

import { CandidateExtractor, loadExtractionLexicon } from '../candidate-extractor.js';

const extractor = new CandidateExtractor(loadExtractionLexicon());

describe('CandidateExtractor.extractNames', () => {
  it('keeps capitalized names and drops stopword-only phrases', () => {
    expect(extractor.extractNames('Top competitors include Deepgram and AssemblyAI.')).toEqual(['Deepgram', 'AssemblyAI']);
  });

  it('reads names listed after a cue phrase', () => {
    expect(extractor.extractNames('Try vendors such as Deepgram, Rev and Otter.')).toEqual(['Deepgram', 'Rev', 'Otter']);
  });

  it('picks up domain-looking tokens', () => {
    expect(extractor.extractNames('pricing on Speechmatics.com today')).toEqual(['Speechmatics.com', 'Speechmatics']);
  });
});

describe('CandidateExtractor.extract', () => {
  it('deduplicates across results and only links a website to the organization it belongs to', () => {
    const candidates = extractor.extract([
      {
        title: 'Deepgram - Speech API',
        url: 'https://deepgram.com/product',
        content: 'Best alternatives to AssemblyAI.',
        score: 0.9
      },
      {
        title: 'Top 10 speech companies',
        url: 'https://www.techcrunch.com/list',
        content: 'Rev.ai and Deepgram lead.',
        score: 0.5
      }
    ]);

    expect(candidates).toEqual([
      { name: 'AssemblyAI', website: null, sourceReference: 'https://deepgram.com/product', rank: 1 },
      { name: 'Deepgram', website: 'https://deepgram.com', sourceReference: 'https://deepgram.com/product', rank: 1 },
      { name: 'Rev.ai', website: null, sourceReference: 'https://www.techcrunch.com/list', rank: 2 }
    ]);
  });

  it('caps the number of candidates per result set', () => {
    const capped = new CandidateExtractor(loadExtractionLexicon(), 1);
    const candidates = capped.extract([{ title: '', url: '', content: 'Deepgram. Speechmatics. Otter.', score: null }]);
    expect(candidates.map((candidate) => candidate.name)).toEqual(['Deepgram']);
  });
});

describe('CandidateExtractor.isLikelyOrganizationName', () => {
  it.each([
    ['Acme Labs', true],
    ['acme', false],
    ['Rev', false],
    ['X9', true],
    ['Rev.ai', true],
    ['Globex', true]
  ])('classifies %s as %s', (name, expected) => {
    expect(extractor.isLikelyOrganizationName(name)).toBe(expected);
  });
});

describe('CandidateExtractor.websiteFromUrl', () => {
  it('derives the root domain of a company site', () => {
    expect(extractor.websiteFromUrl('https://docs.acme.io/start')).toBe('https://acme.io');
  });

  it('skips aggregator domains except crunchbase organization pages', () => {
    expect(extractor.websiteFromUrl('https://www.linkedin.com/company/acme')).toBeNull();
    expect(extractor.websiteFromUrl('https://www.crunchbase.com/organization/deepgram')).toBe('https://deepgram.com');
  });

  it('returns null for unparseable urls', () => {
    expect(extractor.websiteFromUrl('not a url')).toBeNull();
  });
});
