import type { Config, RunMode } from '../shared/config.js';
import type { RecipeDestination } from '../destination/types.js';
import type { DomainFilter } from '../filter/domainFilter.js';
import type { RunCounts, StateLedger } from '../ledger/ledger.js';
import { enabledSources, findSourceForUrl, type Source } from '../sources/sources.js';
import { ledgerDomain, normalizeUrl, stripWww } from '../discovery/normalize.js';
import { CancellationToken } from './cancellation.js';
import {
  ingestUrl,
  organizersFor,
  sourceTag,
  UNKNOWN_SOURCE_KEY,
  type IngestDeps,
  type IngestOutcome,
  type PageSource,
} from './ingest.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

/**
 * What the orchestrator needs from discovery; DiscoveryEngine implements it.
 */
export interface UrlDiscovery {
  discover(source: Source, limit: number): Promise<string[]>;
  hasContentSchema(url: string): Promise<boolean>;
}

export interface ImportContext {
  config: Config;
  sources: readonly Source[];
  filter: DomainFilter;
  ledger: StateLedger;
  destination: RecipeDestination;
  discovery: UrlDiscovery;
  pages: PageSource;
}

export interface ImportOptions {
  mode: RunMode;
  dryRun?: boolean;
  forceUrl?: string;
  forceDomain?: string;
  resetDomain?: string;
}

export interface RunStats {
  discovered: number;
  filtered: number;
  skipped: number;
  imported: number;
  failed: number;
  queued: number;
}

export interface RunResult {
  runId: number;
  mode: RunMode;
  stats: RunStats;
  durationSeconds: number;
  success: boolean;
  cancelled: boolean;
  error: string | null;
}

function emptyStats(): RunStats {
  return { discovered: 0, filtered: 0, skipped: 0, imported: 0, failed: 0, queued: 0 };
}

function countOutcome(stats: RunStats, outcome: IngestOutcome): void {
  switch (outcome) {
    case 'imported':
    case 'imported_via_fallback':
      stats.imported++;
      break;
    case 'queued':
      stats.queued++;
      break;
    case 'failed':
      stats.failed++;
      break;
    case 'skipped':
      stats.skipped++;
      break;
  }
}

/**
 * One import run: discovery, filtering, dedup against the ledger, then
 * ingestion, bounded by the mode's per-site and per-run caps. The run record
 * is completed exactly once whatever happens.
 */
export async function runImport(
  ctx: ImportContext,
  options: ImportOptions,
  token: CancellationToken = new CancellationToken(),
): Promise<RunResult> {
  const { config, ledger, destination } = ctx;
  const { mode } = options;
  const dryRun = options.dryRun ?? false;
  const startedAt = Date.now();

  const stats = emptyStats();
  let runCounts: RunCounts | null = null;
  let error: string | null = null;
  let forcedSuccess: boolean | null = null;

  const runId = ledger.startRun(mode);
  logger.info(
    {
      runId,
      mode,
      dryRun,
      forceUrl: options.forceUrl,
      forceDomain: options.forceDomain,
      resetDomain: options.resetDomain,
    },
    'Import run started',
  );

  try {
    if (options.resetDomain) {
      ledger.resetDomain(options.resetDomain);
    }

    try {
      await destination.checkConnection();
    } catch (err) {
      error = `Cannot connect to destination: ${errorMessage(err)}`;
      logger.error({ runId, error }, 'Destination unavailable, aborting run');
      return finish();
    }

    const sources = enabledSources(ctx.sources);
    if (!dryRun) {
      await ensureOrganizers(destination, sources);
    }

    const deps: IngestDeps = { destination, ledger, pages: ctx.pages };

    if (options.forceUrl) {
      const url = normalizeUrl(options.forceUrl);
      const source = findSourceForUrl(ctx.sources, url);
      const sourceKey = source?.key ?? UNKNOWN_SOURCE_KEY;
      logger.info({ url, source: sourceKey }, 'Forcing single URL import');

      const outcome = await ingestUrl(deps, { url, sourceKey, ...organizersFor(sourceKey, source) }, dryRun);
      countOutcome(stats, outcome);
      stats.discovered = 1;

      forcedSuccess =
        outcome === 'imported' ||
        outcome === 'imported_via_fallback' ||
        outcome === 'queued' ||
        (dryRun && outcome === 'skipped');
      runCounts = {
        discovered: 1,
        imported: forcedSuccess && outcome !== 'skipped' ? 1 : 0,
        failed: forcedSuccess ? 0 : 1,
        skipped: outcome === 'skipped' ? 1 : 0,
      };
      if (!forcedSuccess) error = `Failed to import ${url}`;
      return finish();
    }

    if (options.forceDomain) {
      const marked = ledger.markDomainForReimport(options.forceDomain);
      logger.info({ domain: options.forceDomain, marked }, 'Domain marked for reimport');
    }

    const { per_site: perSite, total_cap: totalCap } = config.limits[mode];
    const forcedDomain = options.forceDomain ? stripWww(options.forceDomain) : null;
    let importedTotal = 0;

    for (const source of sources) {
      if (token.isCancelled) {
        logger.info({ reason: token.cancelReason }, 'Cancellation requested, stopping');
        break;
      }
      if (importedTotal >= totalCap) {
        logger.info({ totalCap }, 'Run cap reached');
        break;
      }

      try {
        const discovered = await ctx.discovery.discover(source, perSite * 2);
        stats.discovered += discovered.length;

        const accepted: string[] = [];
        for (const url of discovered) {
          if (ctx.filter.isValid(url, source.key)) {
            accepted.push(url);
          } else {
            stats.filtered++;
          }
        }

        const fresh: string[] = [];
        for (const url of accepted) {
          const bypass = forcedDomain !== null && ledgerDomain(url).includes(forcedDomain);
          if (!bypass && ledger.isImported(url)) {
            stats.skipped++;
            continue;
          }
          fresh.push(url);
          if (!dryRun) ledger.markDiscovered(url, source.key);
        }

        const limit = Math.min(perSite, totalCap - importedTotal);
        const toImport = await selectForImport(ctx, fresh, limit, stats);
        logger.info(
          {
            source: source.key,
            discovered: discovered.length,
            accepted: accepted.length,
            fresh: fresh.length,
            importing: toImport.length,
          },
          'Source candidates selected',
        );

        const { tags, categories } = organizersFor(source.key, source);
        for (const url of toImport) {
          if (token.isCancelled) break;

          const outcome = await ingestUrl(deps, { url, sourceKey: source.key, tags, categories }, dryRun);
          countOutcome(stats, outcome);
          if (outcome === 'imported' || outcome === 'imported_via_fallback') {
            importedTotal++;
          }
        }
      } catch (err) {
        logger.error({ source: source.key, error: errorMessage(err) }, 'Source failed');
      }
    }

    return finish();
  } catch (err) {
    error = errorMessage(err);
    logger.error({ runId, error }, 'Import run failed');
    return finish();
  } finally {
    ledger.completeRun(
      runId,
      runCounts ?? {
        discovered: stats.discovered,
        imported: stats.imported,
        failed: stats.failed,
        skipped: stats.skipped,
      },
      error ?? (token.isCancelled ? `Interrupted: ${token.cancelReason ?? 'cancelled'}` : null),
    );
  }

  function finish(): RunResult {
    const durationSeconds = (Date.now() - startedAt) / 1000;
    const success = error === null && (forcedSuccess ?? stats.failed === 0);
    const result: RunResult = {
      runId,
      mode,
      stats: { ...stats },
      durationSeconds,
      success,
      cancelled: token.isCancelled,
      error,
    };
    logger.info({ runId, ...result.stats, durationSeconds, success }, 'Import run complete');
    return result;
  }
}

/**
 * Up to `limit` URLs in discovery order. With `require_recipe_schema` set,
 * pages without recipe markup are dropped (and counted as filtered) until the
 * limit is filled.
 */
async function selectForImport(
  ctx: ImportContext,
  urls: readonly string[],
  limit: number,
  stats: RunStats,
): Promise<string[]> {
  if (limit <= 0) return [];
  if (!ctx.config.discovery.require_recipe_schema) {
    return urls.slice(0, limit);
  }

  const selected: string[] = [];
  for (const url of urls) {
    if (selected.length >= limit) break;
    if (await ctx.discovery.hasContentSchema(url)) {
      selected.push(url);
    } else {
      stats.filtered++;
      logger.debug({ url }, 'No recipe schema, skipping');
    }
  }
  return selected;
}

async function ensureOrganizers(destination: RecipeDestination, sources: readonly Source[]): Promise<void> {
  logger.info({ sources: sources.length }, 'Ensuring tags and categories');
  for (const source of sources) {
    await destination.ensureTag(sourceTag(source.key));
    for (const tag of source.tags) {
      await destination.ensureTag(tag);
    }
    for (const category of source.categories) {
      await destination.ensureCategory(category);
    }
  }
}
