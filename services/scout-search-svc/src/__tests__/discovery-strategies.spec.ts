import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { CandidateExtractor, type TextSearchResult } from '../candidate-extractor.js';
import {
  KeywordSearchStrategy,
  SeedExpansionStrategy,
  SeedListStrategy,
  buildKeywordQueries,
  selectSeeds
} from '../discovery-strategies.js';
import type { TextSearchProvider } from '../text-search-client.js';
import type { Requirements } from '../types.js';

const logger = pino({ level: 'silent' });
const extractor = new CandidateExtractor({ stopwords: [], excludedDomains: [], domainSuffixes: ['.ai'] });

const requirements: Requirements = {
  roleTitle: 'ML Engineer',
  mustHave: ['pytorch'],
  niceToHave: [],
  domainKeywords: ['speech recognition', 'voice ai'],
  industryKeywords: ['conversational ai'],
  seeds: ['Acme', '  Globex ', 'ACME Inc', 'Initech'],
  exclusions: ['Globex']
};

function searchReturning(results: TextSearchResult[]): TextSearchProvider & { queries: string[] } {
  const queries: string[] = [];
  return {
    queries,
    search: async (query: string) => {
      queries.push(query);
      return results;
    }
  };
}

const deepgramResult: TextSearchResult = { title: '', url: 'https://deepgram.com', content: 'Deepgram.', score: 1 };

describe('selectSeeds', () => {
  it('removes exclusions and duplicates before applying the cap', () => {
    expect(selectSeeds(requirements, 3)).toEqual(['Acme', 'Initech']);
    expect(selectSeeds(requirements, 1)).toEqual(['Acme']);
  });
});

describe('buildKeywordQueries', () => {
  it('orders generated queries by priority', () => {
    expect(buildKeywordQueries(requirements)).toEqual([
      { query: 'speech recognition companies competitors alternatives', priority: 90 },
      { query: 'speech recognition companies directory list', priority: 80 },
      { query: 'voice ai companies directory list', priority: 79 },
      { query: 'ML Engineer companies in speech recognition', priority: 70 },
      { query: 'conversational ai companies', priority: 60 },
      { query: 'ML Engineer companies', priority: 10 }
    ]);
  });

  it('falls back to the role query when no keywords are given', () => {
    expect(buildKeywordQueries({ roleTitle: 'SRE', mustHave: [], niceToHave: [], domainKeywords: [] })).toEqual([
      { query: 'SRE companies', priority: 10 }
    ]);
  });
});

describe('SeedListStrategy', () => {
  it('emits the selected seeds with seed provenance', async () => {
    const outcome = await new SeedListStrategy(3).run(requirements);

    expect(outcome).toEqual({
      candidates: [
        { name: 'Acme', website: null, provenance: { strategyId: 'seed', sourceQuery: null, sourceReference: null, rank: 1 } },
        { name: 'Initech', website: null, provenance: { strategyId: 'seed', sourceQuery: null, sourceReference: null, rank: 2 } }
      ],
      queriesRun: 0,
      failedQueries: 0
    });
  });
});

describe('SeedExpansionStrategy', () => {
  it('issues the broadened queries for each selected seed', async () => {
    const search = searchReturning([deepgramResult]);
    const outcome = await new SeedExpansionStrategy(search, extractor, 1, logger).run(requirements);

    expect(search.queries).toEqual(['companies similar to Acme', 'Acme competitors', 'Acme alternatives']);
    expect(outcome.queriesRun).toBe(3);
    expect(outcome.candidates[0]).toEqual({
      name: 'Deepgram',
      website: 'https://deepgram.com',
      provenance: {
        strategyId: 'seed_expansion',
        sourceQuery: 'companies similar to Acme',
        sourceReference: 'https://deepgram.com',
        rank: 1
      }
    });
  });
});

describe('KeywordSearchStrategy', () => {
  it('runs only the top queries', async () => {
    const search = searchReturning([deepgramResult]);
    await new KeywordSearchStrategy(search, extractor, 2, logger).run(requirements);

    expect(search.queries).toEqual([
      'speech recognition companies competitors alternatives',
      'speech recognition companies directory list'
    ]);
  });

  it('counts failed queries and keeps the rest', async () => {
    const search: TextSearchProvider = {
      search: vi
        .fn<(query: string) => Promise<TextSearchResult[]>>()
        .mockRejectedValueOnce(new Error('rate limited'))
        .mockResolvedValue([deepgramResult])
    };

    const outcome = await new KeywordSearchStrategy(search, extractor, 3, logger).run(requirements);
    expect(outcome.queriesRun).toBe(3);
    expect(outcome.failedQueries).toBe(1);
    expect(outcome.candidates).toHaveLength(2);
  });

  it('fails the strategy when every query fails', async () => {
    const search: TextSearchProvider = { search: vi.fn().mockRejectedValue(new Error('provider down')) };
    await expect(new KeywordSearchStrategy(search, extractor, 2, logger).run(requirements)).rejects.toThrow('provider down');
  });

  it('stops between queries once the signal is aborted', async () => {
    const controller = new AbortController();
    const search: TextSearchProvider = {
      search: vi.fn(async () => {
        controller.abort();
        return [deepgramResult];
      })
    };

    const outcome = await new KeywordSearchStrategy(search, extractor, 4, logger).run(requirements, controller.signal);
    expect(outcome.queriesRun).toBe(1);
  });
});
