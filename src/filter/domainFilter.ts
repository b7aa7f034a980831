/**
 * Per-site URL allow/deny rules loaded from allowlist.yaml.
 *
 * Default-deny: a URL is accepted only when it clears every deny pattern AND
 * matches an allow pattern of a site that has rules. Unknown sites, and sites
 * without allow patterns, accept nothing.
 */

import { z } from 'zod';
import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { hostMatchesDomain, hostOf, stripWww } from '../discovery/normalize.js';

const SiteRulesSchema = z.object({
  allow_regex: z.array(z.string()).default([]),
  deny_regex: z.array(z.string()).default([]),
});

export const AllowlistSchema = z.object({
  version: z.union([z.number(), z.string()]).optional(),
  common: z
    .object({
      deny_regex: z.array(z.string()).default([]),
      deny_query_regex: z.array(z.string()).default([]),
    })
    .default({}),
  sites: z.record(z.string(), SiteRulesSchema.nullable()).default({}),
});

export type Allowlist = z.infer<typeof AllowlistSchema>;

export interface SiteRules {
  allow: RegExp[];
  deny: RegExp[];
}

export type FilterDecision =
  | { accepted: true }
  | {
      accepted: false;
      reason: 'common_deny' | 'common_deny_query' | 'site_deny' | 'not_allowed' | 'no_allow_rules' | 'unknown_site';
    };

function compile(pattern: string, where: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch (err) {
    throw new ConfigError(`Invalid ${where} regex '${pattern}'`, {
      pattern,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export class DomainFilter {
  private readonly siteDomains = new Map<string, string[]>();

  private constructor(
    private readonly commonDeny: RegExp[],
    private readonly commonDenyQuery: RegExp[],
    private readonly siteRules: Map<string, SiteRules>,
  ) {}

  static fromConfig(raw: unknown): DomainFilter {
    const parsed = AllowlistSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ConfigError('Invalid allowlist configuration', {
        errors: parsed.error.flatten().fieldErrors,
      });
    }

    const { common, sites } = parsed.data;
    const siteRules = new Map<string, SiteRules>();
    for (const [siteKey, rules] of Object.entries(sites)) {
      siteRules.set(siteKey, {
        allow: (rules?.allow_regex ?? []).map((p) => compile(p, `allow (${siteKey})`)),
        deny: (rules?.deny_regex ?? []).map((p) => compile(p, `deny (${siteKey})`)),
      });
    }

    const filter = new DomainFilter(
      common.deny_regex.map((p) => compile(p, 'common deny')),
      common.deny_query_regex.map((p) => compile(p, 'common deny query')),
      siteRules,
    );
    logger.debug(
      { sites: siteRules.size, commonDeny: filter.commonDeny.length },
      'Allowlist compiled',
    );
    return filter;
  }

  /**
   * Site keys are usually passed explicitly; this mapping resolves them for
   * URLs that arrive without one (forced single-URL imports).
   */
  registerSiteDomains(siteKey: string, domains: readonly string[]): void {
    this.siteDomains.set(
      siteKey,
      domains.map(stripWww).filter((d) => d.length > 0),
    );
  }

  siteKeyForUrl(url: string): string | undefined {
    const host = hostOf(url);
    if (!host) return undefined;
    for (const [siteKey, domains] of this.siteDomains) {
      if (domains.some((d) => hostMatchesDomain(host, d))) return siteKey;
    }
    return undefined;
  }

  hasRulesFor(siteKey: string): boolean {
    return this.siteRules.has(siteKey);
  }

  get siteCount(): number {
    return this.siteRules.size;
  }

  evaluate(url: string, siteKey?: string): FilterDecision {
    if (this.commonDeny.some((p) => p.test(url))) {
      return { accepted: false, reason: 'common_deny' };
    }
    if (this.commonDenyQuery.some((p) => p.test(url))) {
      return { accepted: false, reason: 'common_deny_query' };
    }

    const key = siteKey ?? this.siteKeyForUrl(url);
    const rules = key !== undefined ? this.siteRules.get(key) : undefined;
    if (!rules) {
      return { accepted: false, reason: 'unknown_site' };
    }

    if (rules.deny.some((p) => p.test(url))) {
      return { accepted: false, reason: 'site_deny' };
    }
    if (rules.allow.length === 0) {
      return { accepted: false, reason: 'no_allow_rules' };
    }
    return rules.allow.some((p) => p.test(url))
      ? { accepted: true }
      : { accepted: false, reason: 'not_allowed' };
  }

  isValid(url: string, siteKey?: string): boolean {
    const decision = this.evaluate(url, siteKey);
    if (!decision.accepted) {
      logger.debug({ url, siteKey, reason: decision.reason }, 'URL filtered out');
    }
    return decision.accepted;
  }
}

export function loadAllowlist(filePath: string): DomainFilter {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Allowlist not found: ${filePath}`, { path: filePath });
  }

  let raw: unknown;
  try {
    raw = yamlParse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Allowlist is not valid YAML: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const filter = DomainFilter.fromConfig(raw);
  logger.info({ sites: filter.siteCount, path: filePath }, 'Allowlist loaded');
  return filter;
}
