const LEGAL_SUFFIXES = new Set([
  'inc',
  'incorporated',
  'llc',
  'ltd',
  'limited',
  'corp',
  'corporation',
  'co',
  'company',
  'gmbh',
  'ag',
  'pte',
  'pty',
  'plc',
  'bv',
  'sa'
]);

/**
 * Cache key for an organization name: lowercased, punctuation removed,
 * trailing legal suffixes dropped. Returns an empty string when nothing
 * meaningful is left.
 */
export function normalizeEntityName(name: string): string {
  const tokens = name
    .toLowerCase()
    .normalize('NFKC')
    .replace(/[-_/]+/g, ' ')
    .replace(/[^\p{L}\p{N}\s]+/gu, '')
    .split(/\s+/)
    .filter((token) => token.length > 0);

  while (tokens.length > 1 && LEGAL_SUFFIXES.has(tokens[tokens.length - 1] ?? '')) {
    tokens.pop();
  }

  return tokens.join(' ');
}

export function levenshteinDistance(a: string, b: string): number {
  if (a.length < b.length) {
    return levenshteinDistance(b, a);
  }
  if (b.length === 0) {
    return a.length;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 0; i < a.length; i += 1) {
    const current = [i + 1];
    for (let j = 0; j < b.length; j += 1) {
      const insertion = (previous[j + 1] ?? 0) + 1;
      const deletion = (current[j] ?? 0) + 1;
      const substitution = (previous[j] ?? 0) + (a[i] === b[j] ? 0 : 1);
      current.push(Math.min(insertion, deletion, substitution));
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * 1 for identical names, 0.9 when one contains the other, otherwise an
 * edit-distance ratio capped at 0.8.
 */
export function nameSimilarity(left: string, right: string): number {
  const a = normalizeEntityName(left);
  const b = normalizeEntityName(right);
  if (!a || !b) {
    return 0;
  }
  if (a === b) {
    return 1;
  }
  if (a.includes(b) || b.includes(a)) {
    return 0.9;
  }

  const ratio = 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
  return Math.max(0, Math.min(ratio, 0.8));
}

export function normalizeWebsite(website: string | undefined | null): string | null {
  if (!website) {
    return null;
  }
  const trimmed = website.trim().toLowerCase();
  if (!trimmed) {
    return null;
  }
  const withoutScheme = trimmed.replace(/^[a-z]+:\/\//, '').replace(/^www\./, '');
  const host = withoutScheme.split(/[/?#]/)[0] ?? '';
  return host.length > 0 ? host : null;
}
