import { JSDOM } from 'jsdom';
import type { Source } from '../sources/sources.js';
import type { CandidateUrl, DiscoveryStrategy } from './strategy.js';
import type { PoliteFetcher } from './fetcher.js';
import { hostMatchesDomain } from './normalize.js';
import { logger } from '../shared/logger.js';

/**
 * Resolve anchors on an HTML page and keep the http(s) links that stay on the
 * source's declared domains.
 */
export function extractListingLinks(html: string, pageUrl: string, domains: readonly string[]): string[] {
  const doc = new JSDOM(html).window.document;
  const links: string[] = [];

  for (const anchor of Array.from(doc.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href');
    if (!href) continue;

    let resolved: URL;
    try {
      resolved = new URL(href, pageUrl);
    } catch {
      continue;
    }

    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;
    if (!domains.some((d) => hostMatchesDomain(resolved.hostname, d))) continue;

    links.push(resolved.toString());
  }

  return links;
}

export class ListingStrategy implements DiscoveryStrategy {
  readonly kind = 'listing';

  constructor(private readonly fetcher: PoliteFetcher) {}

  async discover(source: Source, remaining: number): Promise<CandidateUrl[]> {
    const results: CandidateUrl[] = [];

    for (const listingUrl of source.listingUrls) {
      if (results.length >= remaining) break;

      const html = await this.fetcher.fetchHtml(listingUrl);
      if (!html) continue;

      const links = extractListingLinks(html, listingUrl, source.domains);
      for (const url of links.slice(0, remaining - results.length)) {
        results.push({ url, publishedAt: null });
      }
      logger.debug({ listingUrl, count: links.length }, 'Listing page crawled');
    }

    return results;
  }
}
