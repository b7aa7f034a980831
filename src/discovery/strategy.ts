import type { Source } from '../sources/sources.js';

export type StrategyKind = 'feed' | 'sitemap' | 'listing';

/**
 * Strategies run in this order; a later one only runs while the limit is unfilled.
 */
export const STRATEGY_ORDER: readonly StrategyKind[] = ['feed', 'sitemap', 'listing'];

/**
 * A discovered page. The date only orders results, it is not part of identity.
 */
export interface CandidateUrl {
  url: string;
  publishedAt: Date | null;
}

export interface DiscoveryStrategy {
  readonly kind: StrategyKind;
  discover(source: Source, remaining: number): Promise<CandidateUrl[]>;
}
