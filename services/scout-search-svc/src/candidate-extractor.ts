import { readFileSync } from 'fs';

import { z } from 'zod';

const lexiconSchema = z.object({
  stopwords: z.array(z.string()),
  excludedDomains: z.array(z.string()),
  domainSuffixes: z.array(z.string())
});

export type ExtractionLexicon = z.infer<typeof lexiconSchema>;

const DEFAULT_LEXICON_URL = new URL('../data/extraction-lexicon.json', import.meta.url);

let cachedLexicon: ExtractionLexicon | null = null;

export function loadExtractionLexicon(location: string | URL = process.env.EXTRACTION_LEXICON_PATH ?? DEFAULT_LEXICON_URL): ExtractionLexicon {
  if (cachedLexicon && location === DEFAULT_LEXICON_URL) {
    return cachedLexicon;
  }
  const lexicon = lexiconSchema.parse(JSON.parse(readFileSync(location, 'utf8')));
  if (location === DEFAULT_LEXICON_URL) {
    cachedLexicon = lexicon;
  }
  return lexicon;
}

export interface TextSearchResult {
  title: string;
  url: string;
  content: string;
  score: number | null;
}

export interface ExtractedCandidate {
  name: string;
  website: string | null;
  sourceReference: string;
  rank: number;
}

const CAPITALIZED_PHRASE = /\b([A-Z][A-Za-z]*(?:[ \t]+[A-Z][A-Za-z]*)*(?:\.ai|\.com|\.io)?)\b/g;
const LIST_AFTER_CUE = /(?:like|including|such as)\s+([A-Z][a-zA-Z\s,&]+?)(?:\.|\s+and\s+[A-Z]|$)/g;
const DOMAIN_TOKEN = /([A-Z][a-zA-Z]+?)(?:\.com|\.ai|\.io)/g;
const CRUNCHBASE_ORG = /\/organization\/([^/?#]+)/;

const MIN_NAME_LENGTH = 3;
const MAX_NAME_LENGTH = 49;

function compact(value: string): string {
  return value.toLowerCase().replace(/[\s.]+/g, '');
}

/**
 * Pulls organization-name candidates out of web search snippets with
 * pattern heuristics and a stopword lexicon.
 */
export class CandidateExtractor {
  private readonly stopwords: Set<string>;

  constructor(
    private readonly lexicon: ExtractionLexicon = loadExtractionLexicon(),
    private readonly maxPerResultSet = 20
  ) {
    this.stopwords = new Set(lexicon.stopwords);
  }

  extract(results: TextSearchResult[]): ExtractedCandidate[] {
    const candidates = new Map<string, ExtractedCandidate>();

    results.forEach((result, index) => {
      const website = this.websiteFromUrl(result.url);
      for (const name of this.extractNames(`${result.content} ${result.title}`)) {
        if (candidates.has(name)) {
          continue;
        }
        const belongsToResult =
          website !== null &&
          (compact(result.url).includes(compact(name)) || result.title.toLowerCase().includes(name.toLowerCase()));
        candidates.set(name, {
          name,
          website: belongsToResult ? website : null,
          sourceReference: result.url,
          rank: index + 1
        });
      }
    });

    return Array.from(candidates.values())
      .filter((candidate) => this.isLikelyOrganizationName(candidate.name))
      .slice(0, this.maxPerResultSet);
  }

  extractNames(text: string): string[] {
    const names: string[] = [];

    for (const match of text.matchAll(CAPITALIZED_PHRASE)) {
      names.push(match[1] ?? '');
    }

    for (const match of text.matchAll(LIST_AFTER_CUE)) {
      for (const part of (match[1] ?? '').split(',')) {
        names.push(part);
      }
    }

    for (const match of text.matchAll(DOMAIN_TOKEN)) {
      names.push(match[1] ?? '');
    }

    const seen = new Set<string>();
    const cleaned: string[] = [];
    for (const raw of names) {
      const name = this.trimStopwords(raw.trim());
      if (name.length < MIN_NAME_LENGTH || name.length > MAX_NAME_LENGTH || seen.has(name)) {
        continue;
      }
      seen.add(name);
      cleaned.push(name);
    }
    return cleaned;
  }

  isLikelyOrganizationName(name: string): boolean {
    if (name.length < 2 || !/\p{L}/u.test(name)) {
      return false;
    }

    const words = name.split(/\s+/);
    if (words.length >= 2) {
      return true;
    }

    if (!/^\p{Lu}/u.test(name)) {
      return false;
    }

    const hasDigits = /\d/.test(name);
    const hasDomainSuffix = this.lexicon.domainSuffixes.some((suffix) => name.toLowerCase().endsWith(suffix));
    return hasDigits || hasDomainSuffix || name.length >= 4;
  }

  /** Company website implied by a result URL, or null for news and aggregator sites. */
  websiteFromUrl(url: string): string | null {
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase().replace(/^www\./, '');
    } catch {
      return null;
    }

    const excluded = this.lexicon.excludedDomains.find((domain) => host === domain || host.endsWith(`.${domain}`));
    if (excluded) {
      if (excluded === 'crunchbase.com') {
        const slug = CRUNCHBASE_ORG.exec(url)?.[1];
        return slug ? `https://${slug}.com` : null;
      }
      return null;
    }

    const parts = host.split('.');
    const root = parts.length > 2 ? parts.slice(-2).join('.') : host;
    return `https://${root}`;
  }

  private trimStopwords(name: string): string {
    const words = name.split(/\s+/).filter((word) => word.length > 0);
    while (words.length > 0 && this.stopwords.has(words[0] ?? '')) {
      words.shift();
    }
    while (words.length > 0 && this.stopwords.has(words[words.length - 1] ?? '')) {
      words.pop();
    }
    return words.join(' ');
  }
}
