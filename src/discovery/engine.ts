import type { Source } from '../sources/sources.js';
import { STRATEGY_ORDER, type CandidateUrl, type DiscoveryStrategy, type StrategyKind } from './strategy.js';
import { FeedStrategy } from './feed.js';
import { SitemapStrategy } from './sitemap.js';
import { ListingStrategy } from './listing.js';
import { containsRecipeSchema } from './schema.js';
import { normalizeUrl } from './normalize.js';
import type { PoliteFetcher } from './fetcher.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

/**
 * Newest first (undated last), then dedup by normalized form and truncate.
 * The sort is stable, so among equal dates earlier strategies stay ahead.
 */
export function rankCandidates(candidates: readonly CandidateUrl[], limit: number): string[] {
  const sorted = [...candidates].sort((a, b) => {
    const ta = a.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    const tb = b.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (ta === tb) return 0;
    return tb > ta ? 1 : -1;
  });

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const candidate of sorted) {
    if (unique.length >= limit) break;
    const normalized = normalizeUrl(candidate.url);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    unique.push(normalized);
  }
  return unique;
}

export class DiscoveryEngine {
  private readonly strategies: Record<StrategyKind, DiscoveryStrategy>;

  constructor(readonly fetcher: PoliteFetcher) {
    this.strategies = {
      feed: new FeedStrategy(fetcher),
      sitemap: new SitemapStrategy(fetcher),
      listing: new ListingStrategy(fetcher),
    };
  }

  /**
   * Up to `limit` normalized URLs for a source, newest first.
   */
  async discover(source: Source, limit: number): Promise<string[]> {
    logger.info({ source: source.key }, `Discovering URLs from: ${source.name}`);
    const candidates: CandidateUrl[] = [];

    for (const kind of STRATEGY_ORDER) {
      const remaining = limit - candidates.length;
      if (remaining <= 0) break;

      let found: CandidateUrl[] = [];
      try {
        found = await this.strategies[kind].discover(source, remaining);
      } catch (err) {
        logger.warn({ source: source.key, strategy: kind, error: errorMessage(err) }, 'Discovery strategy failed');
      }
      logger.debug({ source: source.key, strategy: kind, count: found.length }, 'Strategy finished');
      candidates.push(...found.slice(0, remaining));
    }

    const urls = rankCandidates(candidates, limit);
    logger.info({ source: source.key, count: urls.length }, 'Discovery complete');
    return urls;
  }

  async hasContentSchema(url: string): Promise<boolean> {
    const html = await this.fetcher.fetchHtml(url);
    if (!html) return false;
    return containsRecipeSchema(html);
  }
}
