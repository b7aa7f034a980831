import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseRobotsTxt, isPathAllowed, RobotsPolicy } from '../robots.js';
import { stubFetch } from '../../shared/__tests__/httpStub.js';

const UA = 'RecipeImporter/1.0 (+local homelab)';

const ROBOTS = `
# comment
User-agent: *
Disallow: /wp-admin/
Allow: /wp-admin/admin-ajax.php
Disallow: /*?print=
Disallow: /drafts$

User-agent: BadBot
Disallow: /

Sitemap: https://example.com/sitemap_index.xml
`;

describe('parseRobotsTxt', () => {
  it('collects groups and sitemaps', () => {
    const robots = parseRobotsTxt(ROBOTS);
    expect(robots.groups).toHaveLength(2);
    expect(robots.groups[0].agents).toEqual(['*']);
    expect(robots.groups[0].rules).toHaveLength(4);
    expect(robots.sitemaps).toEqual(['https://example.com/sitemap_index.xml']);
  });

  it('shares one group between consecutive user-agent lines', () => {
    const robots = parseRobotsTxt('User-agent: a\nUser-agent: b\nDisallow: /x');
    expect(robots.groups).toHaveLength(1);
    expect(robots.groups[0].agents).toEqual(['a', 'b']);
  });
});

describe('isPathAllowed', () => {
  const robots = parseRobotsTxt(ROBOTS);

  it('blocks disallowed prefixes', () => {
    expect(isPathAllowed(robots, UA, '/wp-admin/options.php')).toBe(false);
    expect(isPathAllowed(robots, UA, '/lamb-stew')).toBe(true);
  });

  it('lets the longer allow rule win', () => {
    expect(isPathAllowed(robots, UA, '/wp-admin/admin-ajax.php')).toBe(true);
  });

  it('supports wildcards and end anchors', () => {
    expect(isPathAllowed(robots, UA, '/lamb-stew?print=1')).toBe(false);
    expect(isPathAllowed(robots, UA, '/drafts')).toBe(false);
    expect(isPathAllowed(robots, UA, '/drafts/old')).toBe(true);
  });

  it('uses the group naming the agent instead of *', () => {
    expect(isPathAllowed(robots, 'BadBot/2.0', '/lamb-stew')).toBe(false);
  });

  it('prefers allow on equal-length ties', () => {
    const tie = parseRobotsTxt('User-agent: *\nDisallow: /page\nAllow: /page');
    expect(isPathAllowed(tie, UA, '/page')).toBe(true);
  });
});

describe('RobotsPolicy', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches robots.txt once per origin', async () => {
    const { calls } = stubFetch({ 'https://example.com/robots.txt': { body: ROBOTS } });
    const policy = new RobotsPolicy(UA);

    expect(await policy.isAllowed('https://example.com/wp-admin/x')).toBe(false);
    expect(await policy.isAllowed('https://example.com/stew')).toBe(true);
    expect(await policy.listedSitemaps('https://example.com')).toEqual([
      'https://example.com/sitemap_index.xml',
    ]);
    expect(calls).toHaveLength(1);
  });

  it('allows everything when robots.txt is missing', async () => {
    stubFetch({});
    const policy = new RobotsPolicy(UA);
    expect(await policy.isAllowed('https://example.com/wp-admin/x')).toBe(true);
    expect(await policy.listedSitemaps('https://example.com')).toEqual([]);
  });

  it('allows everything when the fetch fails', async () => {
    stubFetch({
      'https://example.com/robots.txt': () => {
        throw new TypeError('fetch failed');
      },
    });
    const policy = new RobotsPolicy(UA);
    expect(await policy.isAllowed('https://example.com/anything')).toBe(true);
  });
});
