// URL canonicalization for article identity

const TRACKING_PARAM = /^(utm_|fbclid$|gclid$)/i;

/**
 * Resolve `raw` against `base` and normalize it into the article's dedup key.
 * Returns null for anything that is not an http(s) URL.
 */
export function canonicalizeUrl(raw: string, base?: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  let url: URL;
  try {
    url = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  url.hash = '';
  for (const key of Array.from(url.searchParams.keys())) {
    if (TRACKING_PARAM.test(key)) url.searchParams.delete(key);
  }

  return url.toString();
}

/**
 * Order-preserving de-duplication
 */
export function uniqueInOrder(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (seen.has(value)) continue;
    seen.add(value);
    result.push(value);
  }
  return result;
}
