import type { RecipeDestination, CreateResult } from '../destination/types.js';
import type { StateLedger } from '../ledger/ledger.js';
import type { Source } from '../sources/sources.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { sha256 } from '../shared/utils.js';

export type IngestOutcome = 'imported' | 'imported_via_fallback' | 'queued' | 'failed' | 'skipped';

export interface PageSource {
  fetchHtml(url: string): Promise<string | null>;
}

export interface IngestDeps {
  destination: RecipeDestination;
  ledger: StateLedger;
  pages: PageSource;
}

export interface IngestTarget {
  url: string;
  sourceKey: string;
  tags: readonly string[];
  categories: readonly string[];
}

export const UNKNOWN_SOURCE_KEY = 'unknown';

export function sourceTag(sourceKey: string): string {
  return `source:${sourceKey}`;
}

/**
 * Tags and categories attached to every recipe imported for a source.
 */
export function organizersFor(
  sourceKey: string,
  source?: Source,
): { tags: string[]; categories: string[] } {
  const tags = [sourceTag(sourceKey)];
  if (source) {
    tags.push(...source.tags.filter((t) => !t.startsWith('source:')));
  }
  return { tags, categories: source ? [...source.categories] : [] };
}

/**
 * First 16 hex chars of the page's sha256, kept to spot changed pages later.
 */
export function contentHash(content: string): string {
  return sha256(content).slice(0, 16);
}

function describe(result: CreateResult): string {
  switch (result.kind) {
    case 'rejected':
      return `rejected (${result.status}): ${result.reason}`;
    case 'unavailable':
      return `unavailable: ${result.reason}`;
    default:
      return result.kind;
  }
}

/**
 * Import one URL: the destination's own scraper first, then the raw page.
 * Every outcome except `skipped` is written to the ledger.
 */
export async function ingestUrl(
  deps: IngestDeps,
  target: IngestTarget,
  dryRun = false,
): Promise<IngestOutcome> {
  const { url, sourceKey } = target;

  if (dryRun) {
    logger.info({ url, source: sourceKey }, 'Dry run, would import');
    return 'skipped';
  }

  try {
    return await cascade(deps, target);
  } catch (err) {
    const error = errorMessage(err);
    logger.error({ url, source: sourceKey, error }, 'Import failed');
    deps.ledger.recordImport(url, sourceKey, 'failed', { error });
    return 'failed';
  }
}

async function cascade(
  { destination, ledger, pages }: IngestDeps,
  { url, sourceKey, tags, categories }: IngestTarget,
): Promise<IngestOutcome> {
  const viaUrl = await destination.createFromUrl(url, tags, categories);

  switch (viaUrl.kind) {
    case 'created':
      ledger.recordImport(url, sourceKey, 'imported', { destinationId: viaUrl.id });
      logger.info({ url, source: sourceKey, name: viaUrl.name }, 'Imported');
      return 'imported';
    case 'already_exists':
      ledger.recordImport(url, sourceKey, 'imported');
      logger.info({ url, source: sourceKey }, 'Already in destination');
      return 'imported';
    case 'queued':
      ledger.recordImport(url, sourceKey, 'queued');
      logger.info({ url, source: sourceKey }, 'Queued by destination');
      return 'queued';
    case 'rejected':
    case 'unavailable':
      break;
  }

  let reason = `URL import ${describe(viaUrl)}`;
  logger.info({ url, source: sourceKey, reason }, 'Trying raw page import');

  const html = await pages.fetchHtml(url);
  if (html) {
    const viaContent = await destination.createFromRawContent(url, html, tags, categories);
    if (viaContent.kind === 'created' || viaContent.kind === 'already_exists') {
      ledger.recordImport(url, sourceKey, 'imported_via_fallback', {
        destinationId: viaContent.kind === 'created' ? viaContent.id : null,
        contentHash: contentHash(html),
      });
      logger.info({ url, source: sourceKey }, 'Imported from raw page');
      return 'imported_via_fallback';
    }
    reason = `raw page import ${describe(viaContent)}`;
  } else {
    reason = `${reason}; raw page could not be fetched`;
  }

  ledger.recordImport(url, sourceKey, 'failed', { error: reason });
  logger.warn({ url, source: sourceKey, error: reason }, 'Import failed');
  return 'failed';
}
