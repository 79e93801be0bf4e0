import { ValidationError } from '@orgscout/common';

import type { BoolQuery, CompiledQuery, FilterRequest, QueryClause } from './types.js';

export class InvalidFilterError extends ValidationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'invalid_filter');
    this.name = 'InvalidFilterError';
  }
}

export interface QueryCompilerOptions {
  chunkSize: number;
  nestedPath: string;
  idField: string;
  titleField: string;
  locationField: string;
}

export const DEFAULT_COMPILER_OPTIONS: QueryCompilerOptions = {
  chunkSize: 50,
  nestedPath: 'experience',
  idField: 'experience.company_id',
  titleField: 'experience.title',
  locationField: 'location'
};

function uniqueIds(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of ids) {
    const id = raw.trim();
    if (id.length > 0 && !seen.has(id)) {
      seen.add(id);
      result.push(id);
    }
  }
  return result;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

/**
 * "Worked at any of these organizations": an OR over chunks of at most
 * `chunkSize` ids, each chunk a nested should-group over the id field.
 */
function buildMembershipClause(ids: string[], options: QueryCompilerOptions): QueryClause {
  const groups: QueryClause[] = chunk(ids, options.chunkSize).map((group) => ({
    nested: {
      path: options.nestedPath,
      query: {
        bool: {
          should: group.map((id) => ({ term: { [options.idField]: id } })),
          minimum_should_match: 1
        }
      }
    }
  }));

  return {
    bool: {
      should: groups,
      minimum_should_match: 1
    }
  };
}

function buildKeywordClause(keyword: string, options: QueryCompilerOptions): QueryClause {
  return {
    nested: {
      path: options.nestedPath,
      query: {
        query_string: {
          query: keyword,
          default_field: options.titleField,
          default_operator: 'OR'
        }
      }
    }
  };
}

function buildLocationClause(location: string, options: QueryCompilerOptions): QueryClause {
  return { match_phrase: { [options.locationField]: location } };
}

/**
 * Compiles a person-search filter into the backend's boolean query tree.
 * Optional keyword and location clauses only ever land in the outer
 * `should` list, with `minimum_should_match: 0`, so they rank without
 * excluding documents.
 */
export function compileQuery(request: FilterRequest, options: QueryCompilerOptions = DEFAULT_COMPILER_OPTIONS): CompiledQuery {
  if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
    throw new InvalidFilterError('Chunk size must be a positive integer.', { chunkSize: options.chunkSize });
  }

  const ids = uniqueIds(request.requiredStableIds);
  if (ids.length === 0) {
    throw new InvalidFilterError('At least one required organization id is needed to build a people query.');
  }

  const must: QueryClause[] = [buildMembershipClause(ids, options)];
  const should: QueryClause[] = [];

  const keyword = request.keyword?.trim() ?? '';
  if (keyword.length > 0) {
    (request.keywordRequired ? must : should).push(buildKeywordClause(keyword, options));
  }

  const location = request.location?.trim() ?? '';
  if (location.length > 0) {
    (request.locationRequired ? must : should).push(buildLocationClause(location, options));
  }

  const bool: BoolQuery = { must };
  if (should.length > 0) {
    bool.should = should;
    bool.minimum_should_match = 0;
  }

  return { query: { bool } };
}

/**
 * Splits the required organizations into batches of `batchSize` and compiles
 * one query per batch, in selection order. Each batch gets its own run of
 * backend pages, so a long selection is not cut off by the page limit.
 */
export function compileQueryBatches(
  request: FilterRequest,
  batchSize: number,
  options: QueryCompilerOptions = DEFAULT_COMPILER_OPTIONS
): CompiledQuery[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new InvalidFilterError('Batch size must be a positive integer.', { batchSize });
  }
  const ids = uniqueIds(request.requiredStableIds);
  if (ids.length === 0) {
    return [compileQuery(request, options)];
  }
  return chunk(ids, batchSize).map((group) => compileQuery({ ...request, requiredStableIds: group }, options));
}

function explainBool(bool: BoolQuery, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth);
  const msm = bool.minimum_should_match === undefined ? '' : ` (minimum_should_match=${bool.minimum_should_match})`;
  lines.push(`${indent}bool${msm}`);
  if (bool.must && bool.must.length > 0) {
    lines.push(`${indent}  must:`);
    bool.must.forEach((clause) => explainClause(clause, depth + 2, lines));
  }
  if (bool.should && bool.should.length > 0) {
    lines.push(`${indent}  should:`);
    bool.should.forEach((clause) => explainClause(clause, depth + 2, lines));
  }
}

function explainClause(clause: QueryClause, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth);
  if ('bool' in clause) {
    explainBool(clause.bool, depth, lines);
  } else if ('nested' in clause) {
    lines.push(`${indent}nested ${clause.nested.path}`);
    explainClause(clause.nested.query, depth + 1, lines);
  } else if ('term' in clause) {
    for (const [field, value] of Object.entries(clause.term)) {
      lines.push(`${indent}term ${field} = ${value}`);
    }
  } else if ('match_phrase' in clause) {
    for (const [field, value] of Object.entries(clause.match_phrase)) {
      lines.push(`${indent}match_phrase ${field} = "${value}"`);
    }
  } else {
    const { query, default_field: field, default_operator: operator } = clause.query_string;
    lines.push(`${indent}query_string ${field} (${operator}) "${query}"`);
  }
}

/** Readable outline of a compiled query, one clause per line. */
export function explainQuery(compiled: CompiledQuery): string {
  const lines: string[] = [];
  explainBool(compiled.query.bool, 0, lines);
  return lines.join('\n');
}
