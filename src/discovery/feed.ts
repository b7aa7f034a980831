import Parser from 'rss-parser';
import type { Source } from '../sources/sources.js';
import type { CandidateUrl, DiscoveryStrategy } from './strategy.js';
import type { PoliteFetcher } from './fetcher.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

export const FEED_PATHS = [
  '/feed',
  '/rss',
  '/feed.xml',
  '/rss.xml',
  '/atom.xml',
  '/feed/atom',
  '/index.xml',
] as const;

interface FeedItemExtras {
  updated?: string;
  published?: string;
}

const parser = new Parser<Record<string, unknown>, FeedItemExtras>({
  customFields: {
    item: ['updated', 'published'],
  },
});

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

function toDate(raw: string | undefined): Date | null {
  if (!raw) return null;
  const date = new Date(raw.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

export class FeedStrategy implements DiscoveryStrategy {
  readonly kind = 'feed';

  constructor(private readonly fetcher: PoliteFetcher) {}

  async discover(source: Source, remaining: number): Promise<CandidateUrl[]> {
    const feedUrls = source.feedUrls.length > 0 ? source.feedUrls : await this.probe(source.baseUrl);
    const results: CandidateUrl[] = [];

    for (const feedUrl of feedUrls) {
      const room = remaining - results.length;
      if (room <= 0) break;
      results.push(...(await this.parseFeed(feedUrl, room)));
    }

    return results;
  }

  /**
   * Look for a feed at the conventional paths; the first one that exists wins.
   */
  private async probe(baseUrl: string): Promise<string[]> {
    for (const path of FEED_PATHS) {
      const feedUrl = new URL(path, baseUrl).toString();
      if (await this.fetcher.exists(feedUrl)) {
        logger.debug({ feedUrl }, 'Feed found');
        return [feedUrl];
      }
    }
    return [];
  }

  async parseFeed(feedUrl: string, limit: number): Promise<CandidateUrl[]> {
    const xml = await this.fetcher.getText(feedUrl, FEED_ACCEPT);
    if (xml === null) return [];

    try {
      const feed = await parser.parseString(xml);
      const results: CandidateUrl[] = [];

      for (const entry of feed.items) {
        if (results.length >= limit) break;
        const url = entry.link?.trim();
        if (!url) continue;

        const publishedAt =
          toDate(entry.isoDate) ?? toDate(entry.pubDate) ?? toDate(entry.published) ?? toDate(entry.updated);
        results.push({ url, publishedAt });
      }

      logger.debug({ feedUrl, count: results.length }, 'Feed parsed');
      return results;
    } catch (err) {
      logger.warn({ feedUrl, error: errorMessage(err) }, 'Feed parse failed');
      return [];
    }
  }
}
