import { z } from 'zod';

import type { BoolQuery, CompiledQuery, PersonRecord, QueryClause, SearchSession, SessionBatch } from './types.js';

const clauseSchema: z.ZodType<QueryClause> = z.lazy(() =>
  z.union([
    z.object({ term: z.record(z.string()) }),
    z.object({ match_phrase: z.record(z.string()) }),
    z.object({
      query_string: z.object({
        query: z.string(),
        default_field: z.string(),
        default_operator: z.enum(['OR', 'AND'])
      })
    }),
    z.object({ nested: z.object({ path: z.string(), query: clauseSchema }) }),
    z.object({ bool: boolSchema })
  ])
);

const boolSchema: z.ZodType<BoolQuery> = z.lazy(() =>
  z.object({
    must: z.array(clauseSchema).optional(),
    should: z.array(clauseSchema).optional(),
    minimum_should_match: z.number().int().min(0).optional()
  })
);

export const compiledQuerySchema: z.ZodType<CompiledQuery> = z.object({
  query: z.object({ bool: boolSchema })
});

const personRecordSchema: z.ZodType<PersonRecord> = z.object({
  recordId: z.string().min(1),
  fullName: z.string().nullable(),
  headline: z.string().nullable(),
  currentTitle: z.string().nullable(),
  currentOrganization: z.string().nullable(),
  location: z.string().nullable(),
  profileUrl: z.string().nullable(),
  raw: z.record(z.unknown())
});

const sessionBatchSchema: z.ZodType<SessionBatch> = z.object({
  compiledQuery: compiledQuerySchema,
  queryHash: z.string(),
  cursor: z.number().int().min(0),
  totalEstimate: z.number().nullable(),
  fetchedItems: z.number().int().min(0),
  exhausted: z.boolean()
});

export const searchSessionSchema: z.ZodType<SearchSession> = z.object({
  sessionId: z.string().min(1),
  batches: z.array(sessionBatchSchema).min(1),
  batchIndex: z.number().int().min(0),
  seenRecordIds: z.array(z.string()),
  pendingRecords: z.array(personRecordSchema),
  createdAt: z.string(),
  ttlHours: z.number().positive(),
  status: z.enum(['created', 'fetching', 'has_more', 'exhausted', 'expired']),
  totalEstimate: z.number().nullable(),
  returnedCount: z.number().int().min(0),
  lastFetchedAt: z.string().nullable(),
  bypassPageCache: z.boolean()
});

export const cachedPageSchema = z.object({
  items: z.array(z.record(z.unknown())),
  totalEstimate: z.number().nullable()
});
