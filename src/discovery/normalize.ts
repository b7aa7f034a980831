/**
 * Query parameters that only carry campaign attribution. Two URLs that differ
 * only in these (or in the fragment) are the same page.
 */
export const TRACKING_PARAMS: ReadonlySet<string> = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'ref',
  'source',
  'campaign',
  'mc_cid',
  'mc_eid',
]);

/**
 * Canonical form used as the ledger key and for dedup:
 * - lowercase scheme + host
 * - drop tracking params, sort the rest
 * - drop the fragment
 * - strip trailing slashes from the path
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim();
  }

  const keysToRemove = [...url.searchParams.keys()].filter((key) => TRACKING_PARAMS.has(key));
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }
  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }

  const search = url.searchParams.toString();
  const port = url.port ? `:${url.port}` : '';
  return `${url.protocol.toLowerCase()}//${url.hostname.toLowerCase()}${port}${pathname}${search ? `?${search}` : ''}`;
}

/**
 * True when `host` is `domain`, a subdomain of it, or matched by a leading-dot
 * wildcard entry such as `.example.com`.
 */
export function hostMatchesDomain(host: string, domain: string): boolean {
  const h = host.toLowerCase();
  const d = domain.trim().toLowerCase();
  if (!d) return false;

  if (d.startsWith('.')) {
    return h === d.slice(1) || h.endsWith(d);
  }
  return h === d || h.endsWith(`.${d}`);
}

export function stripWww(host: string): string {
  const lower = host.trim().toLowerCase();
  return lower.startsWith('www.') ? lower.slice(4) : lower;
}

/**
 * Host form stored in the ledger `domain` column. Force and reset operations
 * match against this, so they must pass their argument through it too.
 */
export function ledgerDomain(url: string): string {
  try {
    return stripWww(new URL(url).hostname);
  } catch {
    return '';
  }
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}
