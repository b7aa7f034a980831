/**
 * robots.txt evaluation.
 *
 * Fail-open: when a site has no retrievable robots.txt every path is allowed.
 * Rules follow RFC 9309 matching: the longest matching Allow/Disallow pattern
 * wins, Allow wins ties, `*` matches any run of characters and a trailing `$`
 * anchors the end of the path.
 */

import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { discardBody } from '../shared/utils.js';

interface RobotsRule {
  allow: boolean;
  pattern: string;
  regex: RegExp;
}

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

export interface ParsedRobots {
  groups: RobotsGroup[];
  sitemaps: string[];
}

export interface RobotsPolicyOptions {
  /** Request timeout in ms (default: 10000) */
  timeoutMs?: number;
}

function compilePattern(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

export function parseRobotsTxt(text: string): ParsedRobots {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const directive = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    switch (directive) {
      case 'user-agent': {
        // Consecutive User-agent lines share one group.
        if (!current || current.rules.length > 0) {
          current = { agents: [], rules: [] };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        break;
      }
      case 'allow':
      case 'disallow': {
        if (!current || !value) break;
        current.rules.push({
          allow: directive === 'allow',
          pattern: value,
          regex: compilePattern(value),
        });
        break;
      }
      case 'sitemap': {
        if (value) sitemaps.push(value);
        break;
      }
      default:
        break;
    }
  }

  return { groups, sitemaps };
}

function productToken(userAgent: string): string {
  return (userAgent.split('/')[0] ?? '').trim().toLowerCase();
}

/**
 * Decide whether `path` (pathname + search) may be fetched by `userAgent`.
 */
export function isPathAllowed(robots: ParsedRobots, userAgent: string, path: string): boolean {
  const token = productToken(userAgent);

  const specific = robots.groups.filter((g) =>
    g.agents.some((agent) => agent !== '*' && token.includes(agent)),
  );
  const applicable =
    specific.length > 0 ? specific : robots.groups.filter((g) => g.agents.includes('*'));

  let best: RobotsRule | null = null;
  for (const group of applicable) {
    for (const rule of group.rules) {
      if (!rule.regex.test(path)) continue;
      if (
        !best ||
        rule.pattern.length > best.pattern.length ||
        (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
      ) {
        best = rule;
      }
    }
  }

  return best ? best.allow : true;
}

function originOf(url: string): string | null {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return null;
  }
}

/**
 * Fetches and caches robots.txt per scheme+host.
 */
export class RobotsPolicy {
  private readonly cache = new Map<string, Promise<ParsedRobots | null>>();
  private readonly timeoutMs: number;

  constructor(
    private readonly userAgent: string,
    options: RobotsPolicyOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async isAllowed(url: string): Promise<boolean> {
    const origin = originOf(url);
    if (!origin) return true;

    const robots = await this.rulesFor(origin);
    if (!robots) return true;

    const parsed = new URL(url);
    return isPathAllowed(robots, this.userAgent, parsed.pathname + parsed.search);
  }

  async listedSitemaps(baseUrl: string): Promise<string[]> {
    const origin = originOf(baseUrl);
    if (!origin) return [];

    const robots = await this.rulesFor(origin);
    return robots ? [...robots.sitemaps] : [];
  }

  private rulesFor(origin: string): Promise<ParsedRobots | null> {
    let pending = this.cache.get(origin);
    if (!pending) {
      pending = this.fetchRobots(origin);
      this.cache.set(origin, pending);
    }
    return pending;
  }

  private async fetchRobots(origin: string): Promise<ParsedRobots | null> {
    const robotsUrl = `${origin}/robots.txt`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(robotsUrl, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.status !== 200) {
        await discardBody(response);
        logger.debug({ robotsUrl, status: response.status }, 'No robots.txt, allowing all');
        return null;
      }

      return parseRobotsTxt(await response.text());
    } catch (err) {
      logger.debug({ robotsUrl, error: errorMessage(err) }, 'robots.txt fetch failed, allowing all');
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
