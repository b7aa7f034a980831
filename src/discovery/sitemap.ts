import { JSDOM } from 'jsdom';
import type { Source } from '../sources/sources.js';
import type { CandidateUrl, DiscoveryStrategy } from './strategy.js';
import type { PoliteFetcher } from './fetcher.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

export const SITEMAP_PATHS = [
  '/sitemap.xml',
  '/sitemap_index.xml',
  '/sitemap-index.xml',
  '/post-sitemap.xml',
] as const;

/** Sub-sitemaps followed per index. */
export const MAX_CHILD_SITEMAPS = 5;
const MAX_INDEX_DEPTH = 3;

const SITEMAP_ACCEPT = 'application/xml, text/xml;q=0.9, */*;q=0.8';

/**
 * `<lastmod>` is either a full W3C datetime or a plain date. Anything else is
 * treated as unknown and sorts last.
 */
export function parseLastmod(raw: string | null | undefined): Date | null {
  if (!raw) return null;
  const text = raw.trim();

  if (text.includes('T')) {
    const date = new Date(text);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(text);
  if (!match) return null;
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return Number.isNaN(date.getTime()) ? null : date;
}

function childText(el: Element, localName: string): string | null {
  const child = Array.from(el.children).find((c) => c.localName === localName);
  const text = child?.textContent?.trim();
  return text ? text : null;
}

export class SitemapStrategy implements DiscoveryStrategy {
  readonly kind = 'sitemap';

  constructor(private readonly fetcher: PoliteFetcher) {}

  async discover(source: Source, remaining: number): Promise<CandidateUrl[]> {
    const sitemapUrls = await this.locate(source);
    const results: CandidateUrl[] = [];

    for (const sitemapUrl of sitemapUrls) {
      const room = remaining - results.length;
      if (room <= 0) break;
      results.push(...(await this.parseSitemap(sitemapUrl, room)));
    }

    return results;
  }

  /**
   * Declared sitemaps first, then those advertised in robots.txt, then every
   * conventional path that exists.
   */
  private async locate(source: Source): Promise<readonly string[]> {
    if (source.sitemapUrls.length > 0) return source.sitemapUrls;

    const listed = await this.fetcher.robots.listedSitemaps(source.baseUrl);
    if (listed.length > 0) return listed;

    const found: string[] = [];
    for (const path of SITEMAP_PATHS) {
      const sitemapUrl = new URL(path, source.baseUrl).toString();
      if (await this.fetcher.exists(sitemapUrl)) {
        found.push(sitemapUrl);
      }
    }
    return found;
  }

  async parseSitemap(sitemapUrl: string, limit: number, depth = 0): Promise<CandidateUrl[]> {
    if (limit <= 0) return [];

    const xml = await this.fetcher.getText(sitemapUrl, SITEMAP_ACCEPT);
    if (xml === null) return [];

    let doc: Document;
    try {
      doc = new JSDOM(xml, { contentType: 'text/xml' }).window.document;
    } catch (err) {
      logger.warn({ sitemapUrl, error: errorMessage(err) }, 'Sitemap parse failed');
      return [];
    }

    const children = Array.from(doc.getElementsByTagNameNS('*', 'sitemap'))
      .map((el) => childText(el, 'loc'))
      .filter((loc): loc is string => loc !== null);

    if (children.length > 0) {
      if (depth >= MAX_INDEX_DEPTH) {
        logger.warn({ sitemapUrl, depth }, 'Sitemap index nested too deep, skipping');
        return [];
      }

      const results: CandidateUrl[] = [];
      for (const child of children.slice(0, MAX_CHILD_SITEMAPS)) {
        const room = limit - results.length;
        if (room <= 0) break;
        results.push(...(await this.parseSitemap(child, room, depth + 1)));
      }
      return results;
    }

    const results: CandidateUrl[] = [];
    // Only scan twice the quota; large sitemaps can hold tens of thousands of entries.
    const entries = Array.from(doc.getElementsByTagNameNS('*', 'url')).slice(0, limit * 2);
    for (const entry of entries) {
      const loc = childText(entry, 'loc');
      if (!loc) continue;
      results.push({ url: loc, publishedAt: parseLastmod(childText(entry, 'lastmod')) });
    }

    logger.debug({ sitemapUrl, count: results.length }, 'Sitemap parsed');
    return results.slice(0, limit);
  }
}
