import { z } from 'zod';
import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { stripWww, hostMatchesDomain } from '../discovery/normalize.js';

const SourceEntrySchema = z.object({
  key: z.string().min(1),
  name: z.string().optional(),
  base: z.string().url().optional(),
  domains: z.array(z.string().min(1)).optional(),
  enabled: z.boolean().default(true),
  tags: z.array(z.string()).default([]),
  categories: z.array(z.string()).default([]),
  discovery: z
    .object({
      rss_candidates: z.array(z.string().url()).default([]),
      sitemap_candidates: z.array(z.string().url()).default([]),
      listing_pages: z.array(z.string().url()).default([]),
    })
    .default({}),
});

export const SourcesFileSchema = z.object({
  sites: z.array(SourceEntrySchema),
});

export type SourceEntry = z.infer<typeof SourceEntrySchema>;

/**
 * A configured site. Immutable for the duration of a run.
 */
export interface Source {
  readonly key: string;
  readonly name: string;
  readonly baseUrl: string;
  readonly domains: readonly string[];
  readonly feedUrls: readonly string[];
  readonly sitemapUrls: readonly string[];
  readonly listingUrls: readonly string[];
  readonly tags: readonly string[];
  readonly categories: readonly string[];
  readonly enabled: boolean;
}

export function toSource(entry: SourceEntry): Source {
  const declared = (entry.domains ?? []).map(stripWww).filter((d) => d.length > 0);
  const domains =
    declared.length > 0 ? declared : entry.base ? [stripWww(new URL(entry.base).hostname)] : [];

  const firstDomain = domains[0];
  const baseUrl = entry.base ?? (firstDomain ? `https://${firstDomain.replace(/^\./, '')}` : undefined);
  if (!baseUrl) {
    throw new ConfigError(`Source "${entry.key}" needs a base URL or at least one domain`, {
      key: entry.key,
    });
  }

  return {
    key: entry.key,
    name: entry.name ?? entry.key,
    baseUrl,
    domains,
    feedUrls: entry.discovery.rss_candidates,
    sitemapUrls: entry.discovery.sitemap_candidates,
    listingUrls: entry.discovery.listing_pages,
    tags: entry.tags,
    categories: entry.categories,
    enabled: entry.enabled,
  };
}

export function parseSources(raw: unknown): Source[] {
  const parsed = SourcesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid sources configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  const seen = new Set<string>();
  const sources: Source[] = [];
  for (const entry of parsed.data.sites) {
    if (seen.has(entry.key)) {
      throw new ConfigError(`Duplicate source key: ${entry.key}`, { key: entry.key });
    }
    seen.add(entry.key);
    sources.push(toSource(entry));
  }
  return sources;
}

/**
 * Load every configured source, enabled or not.
 */
export function loadSources(filePath: string): Source[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Sources configuration not found: ${filePath}`, { path: filePath });
  }

  let raw: unknown;
  try {
    raw = yamlParse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Sources configuration is not valid YAML: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const sources = parseSources(raw);
  logger.info({ count: sources.length, path: filePath }, 'Sources loaded');
  return sources;
}

export function enabledSources(sources: readonly Source[]): Source[] {
  return sources.filter((s) => s.enabled);
}

/**
 * The source whose declared domains cover the URL's host, if any.
 */
export function findSourceForUrl(sources: readonly Source[], url: string): Source | undefined {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    return undefined;
  }
  return sources.find((s) => s.domains.some((d) => hostMatchesDomain(host, d)));
}
