import { describe, expect, it } from 'vitest';

import { DEFAULT_COMPILER_OPTIONS, InvalidFilterError, compileQuery, compileQueryBatches, explainQuery } from '../query-compiler.js';
import type { FilterRequest, QueryClause } from '../types.js';

function collectMustClauses(clauses: QueryClause[] | undefined, out: QueryClause[]): void {
  for (const clause of clauses ?? []) {
    out.push(clause);
    walk(clause, out);
  }
}

/** Every clause that sits directly in some `must` array anywhere in the tree. */
function walk(clause: QueryClause, mustClauses: QueryClause[]): void {
  if ('bool' in clause) {
    collectMustClauses(clause.bool.must, mustClauses);
    for (const child of clause.bool.should ?? []) {
      walk(child, mustClauses);
    }
  } else if ('nested' in clause) {
    walk(clause.nested.query, mustClauses);
  }
}

function mustClausesOf(request: FilterRequest): QueryClause[] {
  const compiled = compileQuery(request);
  const out: QueryClause[] = [];
  walk({ bool: compiled.query.bool }, out);
  return out;
}

describe('compileQuery', () => {
  it('places the membership group in must and an optional keyword in should', () => {
    const compiled = compileQuery({
      requiredStableIds: ['101', '202'],
      keyword: 'ml engineer OR ai engineer',
      keywordRequired: false
    });

    expect(compiled).toEqual({
      query: {
        bool: {
          must: [
            {
              bool: {
                should: [
                  {
                    nested: {
                      path: 'experience',
                      query: {
                        bool: {
                          should: [{ term: { 'experience.company_id': '101' } }, { term: { 'experience.company_id': '202' } }],
                          minimum_should_match: 1
                        }
                      }
                    }
                  }
                ],
                minimum_should_match: 1
              }
            }
          ],
          should: [
            {
              nested: {
                path: 'experience',
                query: {
                  query_string: {
                    query: 'ml engineer OR ai engineer',
                    default_field: 'experience.title',
                    default_operator: 'OR'
                  }
                }
              }
            }
          ],
          minimum_should_match: 0
        }
      }
    });
  });

  it('never puts optional keyword or location clauses in a must array', () => {
    const requests: FilterRequest[] = [
      { requiredStableIds: ['1'], keyword: 'data engineer', location: 'Berlin' },
      { requiredStableIds: ['1', '2', '3'], keyword: 'sre', keywordRequired: false, location: 'Austin', locationRequired: false },
      { requiredStableIds: ['1'], keyword: 'platform', keywordRequired: true, location: 'Paris', locationRequired: false },
      { requiredStableIds: ['1'], keyword: 'platform', keywordRequired: false, location: 'Paris', locationRequired: true }
    ];

    for (const request of requests) {
      const must = mustClausesOf(request);
      const hasKeyword = must.some((clause) => 'nested' in clause && 'query_string' in clause.nested.query);
      const hasLocation = must.some((clause) => 'match_phrase' in clause);
      expect(hasKeyword).toBe(request.keywordRequired === true);
      expect(hasLocation).toBe(request.locationRequired === true);
    }
  });

  it('puts required filters in must and omits the outer should when empty', () => {
    const compiled = compileQuery({
      requiredStableIds: ['7'],
      keyword: 'backend',
      keywordRequired: true,
      location: 'Lisbon',
      locationRequired: true
    });

    expect(compiled.query.bool.must).toHaveLength(3);
    expect(compiled.query.bool.must?.[2]).toEqual({ match_phrase: { location: 'Lisbon' } });
    expect(compiled.query.bool.should).toBeUndefined();
    expect(compiled.query.bool.minimum_should_match).toBeUndefined();
  });

  it('treats an empty keyword as no keyword filter', () => {
    const compiled = compileQuery({ requiredStableIds: ['7'], keyword: '   ', keywordRequired: true });
    expect(compiled.query.bool.must).toHaveLength(1);
    expect(compiled.query.bool.should).toBeUndefined();
  });

  it('compiles identical requests to identical trees', () => {
    const request: FilterRequest = { requiredStableIds: ['9', '3', '9'], keyword: 'ml', location: 'NYC' };
    expect(compileQuery(request)).toEqual(compileQuery(request));
    expect(JSON.stringify(compileQuery(request))).toBe(JSON.stringify(compileQuery(request)));
  });

  it('splits large id sets into chunked should-groups', () => {
    const ids = Array.from({ length: 120 }, (_, index) => `id-${index + 1}`);
    const compiled = compileQuery({ requiredStableIds: ids });
    const membership = compiled.query.bool.must?.[0];

    if (!membership || !('bool' in membership)) {
      throw new Error('expected a bool membership clause');
    }
    const groups = membership.bool.should ?? [];
    expect(membership.bool.minimum_should_match).toBe(1);
    expect(groups).toHaveLength(3);

    const sizes = groups.map((group) =>
      'nested' in group && 'bool' in group.nested.query ? (group.nested.query.bool.should ?? []).length : 0
    );
    expect(sizes).toEqual([50, 50, 20]);
  });

  it('deduplicates and trims ids before chunking', () => {
    const compiled = compileQuery({ requiredStableIds: [' 5 ', '5', '6'] }, { ...DEFAULT_COMPILER_OPTIONS, chunkSize: 1 });
    const membership = compiled.query.bool.must?.[0];
    expect(membership && 'bool' in membership ? membership.bool.should : []).toHaveLength(2);
  });

  it('rejects a request without required ids', () => {
    expect(() => compileQuery({ requiredStableIds: [] })).toThrow(InvalidFilterError);
    expect(() => compileQuery({ requiredStableIds: ['  '] })).toThrow(InvalidFilterError);
  });

  it('rejects a non-positive chunk size', () => {
    expect(() => compileQuery({ requiredStableIds: ['1'] }, { ...DEFAULT_COMPILER_OPTIONS, chunkSize: 0 })).toThrow(
      InvalidFilterError
    );
  });
});

describe('explainQuery', () => {
  it('renders the compiled tree as indented lines', () => {
    const compiled = compileQuery({ requiredStableIds: ['101', '202'], keyword: 'ml engineer OR ai engineer' });

    expect(explainQuery(compiled).split('\n')).toEqual([
      'bool (minimum_should_match=0)',
      '  must:',
      '    bool (minimum_should_match=1)',
      '      should:',
      '        nested experience',
      '          bool (minimum_should_match=1)',
      '            should:',
      '              term experience.company_id = 101',
      '              term experience.company_id = 202',
      '  should:',
      '    nested experience',
      '      query_string experience.title (OR) "ml engineer OR ai engineer"'
    ]);
  });
});

describe('compileQueryBatches', () => {
  it('compiles one query per batch of organizations, in order', () => {
    const batches = compileQueryBatches({ requiredStableIds: ['c-1', 'c-2', ' c-1 ', 'c-3'], location: 'Berlin' }, 2);

    expect(batches).toEqual([
      compileQuery({ requiredStableIds: ['c-1', 'c-2'], location: 'Berlin' }),
      compileQuery({ requiredStableIds: ['c-3'], location: 'Berlin' })
    ]);
  });

  it('keeps a short selection in a single query', () => {
    expect(compileQueryBatches({ requiredStableIds: ['c-1', 'c-2'] }, 5)).toEqual([compileQuery({ requiredStableIds: ['c-1', 'c-2'] })]);
  });

  it('rejects a non-positive batch size and an empty selection', () => {
    expect(() => compileQueryBatches({ requiredStableIds: ['c-1'] }, 0)).toThrow(InvalidFilterError);
    expect(() => compileQueryBatches({ requiredStableIds: ['  '] }, 5)).toThrow(InvalidFilterError);
  });
});
