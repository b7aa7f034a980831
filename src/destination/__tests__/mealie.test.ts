import { describe, it, expect, afterEach, beforeAll, afterAll, vi } from 'vitest';
import { MealieClient } from '../mealie.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { DestinationError } from '../../shared/errors.js';
import { stubFetch, json } from '../../shared/__tests__/httpStub.js';
import { startStallingServer, type StallingServer } from '../../shared/__tests__/stallingServer.js';

const BASE = 'http://mealie.test';

function makeClient(): { client: MealieClient; sleeps: number[] } {
  const sleeps: number[] = [];
  const client = new MealieClient(
    {
      ...generateDefaultConfig().destination,
      base_url: `${BASE}/`,
      api_token: 'test-secret',
      retries: 2,
      retry_backoff_ms: 100,
    },
    {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    },
  );
  return { client, sleeps };
}

describe('MealieClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('checkConnection', () => {
    it('returns the server version and sends auth headers', async () => {
      const { calls } = stubFetch({ [`${BASE}/api/app/about`]: json({ version: 'v1.12.0' }) });
      const { client } = makeClient();

      expect(await client.checkConnection()).toEqual({ version: 'v1.12.0' });
      expect(calls[0].headers['authorization']).toBe('Bearer test-secret');
      expect(calls[0].headers['accept-language']).toBe('en-US');
    });

    it('throws when the server refuses', async () => {
      stubFetch({ [`${BASE}/api/app/about`]: { status: 401, body: 'unauthorized' } });
      await expect(makeClient().client.checkConnection()).rejects.toThrow(DestinationError);
    });

    it('throws when the server cannot be reached', async () => {
      stubFetch({
        [`${BASE}/api/app/about`]: () => {
          throw new TypeError('fetch failed');
        },
      });
      const { client, sleeps } = makeClient();
      await expect(client.checkConnection()).rejects.toThrow('fetch failed');
      expect(sleeps).toEqual([100, 200]);
    });
  });

  describe('createFromUrl', () => {
    it('maps 201, 202 and 409', async () => {
      const replies = [json('lamb-stew', 201), { status: 202, body: '' }, { status: 409, body: 'exists' }];
      stubFetch({ [`POST ${BASE}/api/recipes/create/url`]: replies });
      const { client } = makeClient();

      expect(await client.createFromUrl('https://example.com/stew', [], [])).toEqual({
        kind: 'created',
        id: 'lamb-stew',
        name: 'lamb-stew',
      });
      expect(await client.createFromUrl('https://example.com/stew', [], [])).toEqual({ kind: 'queued' });
      expect(await client.createFromUrl('https://example.com/stew', [], [])).toEqual({ kind: 'already_exists' });
    });

    it('sends the URL and the include-tags flag', async () => {
      const { calls } = stubFetch({ [`POST ${BASE}/api/recipes/create/url`]: { status: 409 } });
      await makeClient().client.createFromUrl('https://example.com/stew', [], []);

      expect(JSON.parse(calls[0].body ?? '')).toEqual({ url: 'https://example.com/stew', includeTags: true });
      expect(calls[0].headers['content-type']).toBe('application/json');
    });

    it('reads slug and name from an object body', async () => {
      stubFetch({
        [`POST ${BASE}/api/recipes/create/url`]: json({ slug: 'pie', name: 'Apple Pie' }, 201),
      });
      expect(await makeClient().client.createFromUrl('https://example.com/pie', [], [])).toEqual({
        kind: 'created',
        id: 'pie',
        name: 'Apple Pie',
      });
    });

    it('reports client errors as rejected', async () => {
      stubFetch({ [`POST ${BASE}/api/recipes/create/url`]: { status: 400, body: 'no recipe found' } });
      expect(await makeClient().client.createFromUrl('https://example.com/x', [], [])).toEqual({
        kind: 'rejected',
        reason: 'no recipe found',
        status: 400,
      });
    });

    it('retries server errors with exponential backoff, then gives up as unavailable', async () => {
      const { calls } = stubFetch({ [`POST ${BASE}/api/recipes/create/url`]: { status: 503, body: 'busy' } });
      const { client, sleeps } = makeClient();

      expect(await client.createFromUrl('https://example.com/x', [], [])).toEqual({
        kind: 'unavailable',
        reason: 'HTTP 503: busy',
      });
      expect(calls).toHaveLength(3);
      expect(sleeps).toEqual([100, 200]);
    });

    it('recovers when a retry succeeds', async () => {
      stubFetch({ [`POST ${BASE}/api/recipes/create/url`]: [{ status: 502 }, { status: 202 }] });
      expect(await makeClient().client.createFromUrl('https://example.com/x', [], [])).toEqual({ kind: 'queued' });
    });

    it('releases the body of a response it retries', async () => {
      let cancelled = 0;
      let served = 0;
      stubFetch({
        [`POST ${BASE}/api/recipes/create/url`]: () => {
          served += 1;
          if (served > 1) return new Response('', { status: 202 });
          const body = new ReadableStream<Uint8Array>({
            cancel() {
              cancelled += 1;
            },
          });
          return new Response(body, { status: 503 });
        },
      });

      expect(await makeClient().client.createFromUrl('https://example.com/x', [], [])).toEqual({ kind: 'queued' });
      expect(cancelled).toBe(1);
    });
  });

  describe('createFromRawContent', () => {
    it('posts the page and never reports queued', async () => {
      const { calls } = stubFetch({
        [`POST ${BASE}/api/recipes/create/html-or-json`]: [json('stew', 201), { status: 202 }],
      });
      const { client } = makeClient();

      expect(await client.createFromRawContent('https://example.com/stew', '<html/>', [], [])).toEqual({
        kind: 'created',
        id: 'stew',
        name: 'stew',
      });
      expect(JSON.parse(calls[0].body ?? '')).toEqual({
        url: 'https://example.com/stew',
        data: '<html/>',
        includeTags: true,
      });
      expect(await client.createFromRawContent('https://example.com/stew', '<html/>', [], [])).toEqual({
        kind: 'rejected',
        reason: 'HTTP 202',
        status: 202,
      });
    });
  });

  describe('organizers', () => {
    it('finds an existing tag case-insensitively and caches it', async () => {
      const { calls } = stubFetch({
        [`GET ${BASE}/api/organizers/tags?search=Italian`]: json({ items: [{ id: 't1', name: 'italian' }] }),
      });
      const { client } = makeClient();

      expect(await client.ensureTag('Italian')).toBe('t1');
      expect(await client.ensureTag('Italian')).toBe('t1');
      expect(calls).toHaveLength(1);
    });

    it('creates a missing category', async () => {
      stubFetch({
        [`GET ${BASE}/api/organizers/categories?search=Dinner`]: json([]),
        [`POST ${BASE}/api/organizers/categories`]: json({ id: 'c1', name: 'Dinner' }, 201),
      });
      expect(await makeClient().client.ensureCategory('Dinner')).toBe('c1');
    });

    it('looks up again when creation conflicts', async () => {
      stubFetch({
        [`GET ${BASE}/api/organizers/tags?search=source%3Akitchen`]: [
          json([]),
          json([{ id: 't9', name: 'source:kitchen' }]),
        ],
        [`POST ${BASE}/api/organizers/tags`]: { status: 409 },
      });
      expect(await makeClient().client.ensureTag('source:kitchen')).toBe('t9');
    });

    it('returns null when the organizer cannot be created', async () => {
      stubFetch({
        [`GET ${BASE}/api/organizers/tags?search=x`]: json([]),
        [`POST ${BASE}/api/organizers/tags`]: { status: 422 },
      });
      expect(await makeClient().client.ensureTag('x')).toBeNull();
    });

    it('merges missing organizers into a newly created recipe', async () => {
      const { calls } = stubFetch({
        [`POST ${BASE}/api/recipes/create/url`]: json('lamb-stew', 201),
        [`GET ${BASE}/api/recipes/lamb-stew`]: json({
          slug: 'lamb-stew',
          tags: [{ id: 't0', name: 'Italian', slug: 'italian' }],
          recipeCategory: [],
        }),
        [`GET ${BASE}/api/organizers/tags?search=source%3Akitchen`]: json([{ id: 't1', name: 'source:kitchen' }]),
        [`GET ${BASE}/api/organizers/categories?search=Dinner`]: json([{ id: 'c1', name: 'Dinner' }]),
        [`PATCH ${BASE}/api/recipes/lamb-stew`]: json({}),
      });

      await makeClient().client.createFromUrl('https://example.com/stew', ['source:kitchen', 'italian'], ['Dinner']);

      const patch = calls.find((c) => c.method === 'PATCH');
      expect(JSON.parse(patch?.body ?? '')).toEqual({
        tags: [
          { id: 't0', name: 'Italian', slug: 'italian' },
          { id: 't1', name: 'source:kitchen' },
        ],
        recipeCategory: [{ id: 'c1', name: 'Dinner' }],
      });
    });

    it('touches nothing when the recipe already exists', async () => {
      const { calls } = stubFetch({ [`POST ${BASE}/api/recipes/create/url`]: { status: 409 } });
      await makeClient().client.createFromUrl('https://example.com/stew', ['source:kitchen'], ['Dinner']);
      expect(calls).toHaveLength(1);
    });
  });

  describe('timeouts', () => {
    let server: StallingServer;

    beforeAll(async () => {
      server = await startStallingServer(201);
    });

    afterAll(async () => {
      await server.close();
    });

    function clientAt(baseUrl: string): { client: MealieClient; sleeps: number[] } {
      const sleeps: number[] = [];
      const client = new MealieClient(
        {
          ...generateDefaultConfig().destination,
          base_url: baseUrl,
          api_token: 'test-secret',
          timeout_ms: 150,
          retries: 1,
          retry_backoff_ms: 10,
        },
        {
          sleep: async (ms) => {
            sleeps.push(ms);
          },
        },
      );
      return { client, sleeps };
    }

    it('reports a server that never answers as unavailable after retrying', async () => {
      const { client, sleeps } = clientAt(server.silentUrl);
      expect(await client.createFromUrl('https://example.com/stew', [], [])).toEqual({
        kind: 'unavailable',
        reason: 'timed out after 150ms',
      });
      expect(sleeps).toEqual([10]);
    });

    it('bounds reading a response body that never ends', async () => {
      const { client } = clientAt(server.stalledBodyUrl);
      expect(await client.createFromUrl('https://example.com/stew', [], [])).toEqual({
        kind: 'unavailable',
        reason: 'timed out after 150ms',
      });
    });

    it('fails the connection check instead of hanging', async () => {
      const { client } = clientAt(server.stalledBodyUrl);
      await expect(client.checkConnection()).rejects.toThrow('timed out after 150ms');
    });
  });
});
