import { getLogger, type Logger } from '@orgscout/common';

import { nameSimilarity, normalizeWebsite } from './entity-name.js';
import type { BackendDocument, CompanySearchBackend } from './search-backend-client.js';
import type { EntityMetadata, LookupTier, ResolutionHints } from './types.js';

export interface LookupMatch {
  stableId: string;
  confidence: number;
  tier: LookupTier;
  metadata: EntityMetadata;
}

/** External resolver behind the entity cache. `null` means "no match in any tier". */
export interface EntityResolver {
  lookup(name: string, hints?: ResolutionHints): Promise<LookupMatch | null>;
}

export interface CompanyLookupOptions {
  minConfidence: number;
  candidatesPerTier?: number;
  logger?: Logger;
}

const WEBSITE_MATCH_CONFIDENCE = 0.95;

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return undefined;
}

function readId(source: Record<string, unknown>): string | null {
  const value = source.id;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return null;
}

export function toEntityMetadata(source: Record<string, unknown>): EntityMetadata {
  const metadata: EntityMetadata = {};
  const name = readString(source, 'name');
  const website = readString(source, 'website');
  const industry = readString(source, 'industry');
  const location = readString(source, 'location') ?? readString(source, 'hq_location');
  const size = readString(source, 'size_range') ?? readString(source, 'size');
  const description = readString(source, 'description');
  const employees = source.employees_count;

  if (name) metadata.matchedName = name;
  if (website) metadata.website = website;
  if (industry) metadata.industry = industry;
  if (location) metadata.location = location;
  if (size) metadata.size = size;
  if (description) metadata.description = description;
  if (typeof employees === 'number' && Number.isFinite(employees)) metadata.employeeCount = employees;

  return metadata;
}

/** 70% name similarity, 30% backend relevance score normalised to 0..1. */
export function scoreCandidate(requestedName: string, document: BackendDocument): number {
  const similarity = nameSimilarity(requestedName, readString(document.source, 'name') ?? '');
  const normalizedScore = Math.min(Math.max(document.score ?? 0, 0) / 10, 1);
  return Math.round((similarity * 0.7 + normalizedScore * 0.3) * 100) / 100;
}

/**
 * Resolves an organization name against the backend's company index,
 * trying an exact-name query, then the website hint, then a fuzzy query.
 */
export class CompanyLookup implements EntityResolver {
  private readonly logger: Logger;
  private readonly candidatesPerTier: number;

  constructor(
    private readonly backend: CompanySearchBackend,
    private readonly options: CompanyLookupOptions
  ) {
    this.logger = options.logger ?? getLogger({ module: 'company-lookup' });
    this.candidatesPerTier = options.candidatesPerTier ?? 5;
  }

  async lookup(name: string, hints: ResolutionHints = {}): Promise<LookupMatch | null> {
    const byName = await this.lookupByName(name);
    if (byName) {
      return byName;
    }

    const website = normalizeWebsite(hints.website);
    if (website) {
      const byWebsite = await this.lookupByWebsite(website);
      if (byWebsite) {
        return byWebsite;
      }
    }

    const fuzzy = await this.lookupFuzzy(name);
    if (!fuzzy) {
      this.logger.debug({ name }, 'No company match in any lookup tier.');
    }
    return fuzzy;
  }

  private async lookupByName(name: string): Promise<LookupMatch | null> {
    const documents = await this.backend.searchCompanies({
      query: { match_phrase: { name } },
      size: this.candidatesPerTier
    });
    return this.pickBest(name, documents, 'name');
  }

  private async lookupByWebsite(website: string): Promise<LookupMatch | null> {
    const documents = await this.backend.searchCompanies({
      query: { match_phrase: { website } },
      size: this.candidatesPerTier
    });

    for (const document of documents) {
      const stableId = readId(document.source);
      if (stableId && normalizeWebsite(readString(document.source, 'website')) === website) {
        return {
          stableId,
          confidence: WEBSITE_MATCH_CONFIDENCE,
          tier: 'website',
          metadata: toEntityMetadata(document.source)
        };
      }
    }
    return null;
  }

  private async lookupFuzzy(name: string): Promise<LookupMatch | null> {
    const documents = await this.backend.searchCompanies({
      query: { match: { name: { query: name, fuzziness: 'AUTO' } } },
      size: this.candidatesPerTier
    });
    return this.pickBest(name, documents, 'fuzzy');
  }

  private pickBest(name: string, documents: BackendDocument[], tier: LookupTier): LookupMatch | null {
    let best: LookupMatch | null = null;
    for (const document of documents) {
      const stableId = readId(document.source);
      if (!stableId) {
        continue;
      }
      const confidence = scoreCandidate(name, document);
      if (!best || confidence > best.confidence) {
        best = { stableId, confidence, tier, metadata: toEntityMetadata(document.source) };
      }
    }

    if (best && best.confidence >= this.options.minConfidence) {
      return best;
    }
    return null;
  }
}
