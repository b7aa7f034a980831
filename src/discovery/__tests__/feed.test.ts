import { describe, it, expect, afterEach, vi } from 'vitest';
import { FeedStrategy } from '../feed.js';
import { PoliteFetcher } from '../fetcher.js';
import type { Source } from '../../sources/sources.js';
import { stubFetch } from '../../shared/__tests__/httpStub.js';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Kitchen</title>
    <link>https://example.com</link>
    <item>
      <title>Lamb Stew</title>
      <link>https://example.com/lamb-stew/</link>
      <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Bean Soup</title>
      <link>https://example.com/bean-soup/</link>
    </item>
    <item>
      <title>No link</title>
    </item>
    <item>
      <title>Pie</title>
      <link>https://example.com/pie/</link>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Kitchen</title>
  <entry>
    <title>Flatbread</title>
    <link href="https://example.com/flatbread"/>
    <id>flatbread</id>
    <updated>2024-02-03T10:00:00Z</updated>
  </entry>
</feed>`;

function makeSource(overrides: Partial<Source> = {}): Source {
  return {
    key: 'kitchen',
    name: 'Kitchen',
    baseUrl: 'https://example.com',
    domains: ['example.com'],
    feedUrls: [],
    sitemapUrls: [],
    listingUrls: [],
    tags: [],
    categories: [],
    enabled: true,
    ...overrides,
  };
}

function makeStrategy(): FeedStrategy {
  return new FeedStrategy(new PoliteFetcher({ userAgent: 'TestAgent/1.0', throttleSeconds: 0 }));
}

describe('FeedStrategy', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('parses declared RSS feeds, skipping items without links', async () => {
    stubFetch({ 'https://example.com/feed/': { body: RSS } });
    const found = await makeStrategy().discover(
      makeSource({ feedUrls: ['https://example.com/feed/'] }),
      10,
    );

    expect(found.map((c) => c.url)).toEqual([
      'https://example.com/lamb-stew/',
      'https://example.com/bean-soup/',
      'https://example.com/pie/',
    ]);
    expect(found[0].publishedAt?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(found[1].publishedAt).toBeNull();
  });

  it('stops at the remaining quota', async () => {
    stubFetch({ 'https://example.com/feed/': { body: RSS } });
    const found = await makeStrategy().discover(
      makeSource({ feedUrls: ['https://example.com/feed/'] }),
      2,
    );
    expect(found).toHaveLength(2);
  });

  it('reads Atom entries and their updated date', async () => {
    stubFetch({ 'https://example.com/atom.xml': { body: ATOM } });
    const found = await makeStrategy().parseFeed('https://example.com/atom.xml', 10);

    expect(found).toHaveLength(1);
    expect(found[0].url).toBe('https://example.com/flatbread');
    expect(found[0].publishedAt?.toISOString()).toBe('2024-02-03T10:00:00.000Z');
  });

  it('probes the conventional paths and uses the first that exists', async () => {
    const { calls } = stubFetch({
      'HEAD https://example.com/rss': { status: 200 },
      'HEAD https://example.com/feed.xml': { status: 200 },
      'GET https://example.com/rss': { body: RSS },
    });
    const found = await makeStrategy().discover(makeSource(), 10);

    expect(found).toHaveLength(3);
    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      'HEAD https://example.com/feed',
      'HEAD https://example.com/rss',
      'GET https://example.com/rss',
    ]);
  });

  it('yields nothing for a malformed feed', async () => {
    stubFetch({ 'https://example.com/feed': { body: 'this is not xml <' } });
    expect(await makeStrategy().parseFeed('https://example.com/feed', 10)).toEqual([]);
  });
});
