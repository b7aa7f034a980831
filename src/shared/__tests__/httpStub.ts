import { vi } from 'vitest';

export interface StubbedReply {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
}

export type StubRoute =
  | StubbedReply
  | StubbedReply[]
  | ((init: RequestInit | undefined) => Response | Promise<Response>);

export interface RecordedCall {
  url: string;
  method: string;
  body: string | undefined;
  headers: Record<string, string>;
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * Replace the global fetch with a route table. Keys are either `METHOD url`
 * or a bare url (any method). Arrays answer in order, repeating the last
 * reply. Unknown URLs get a 404. Undo with `vi.unstubAllGlobals()`.
 */
export function stubFetch(routes: Record<string, StubRoute>): { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const served = new Map<string, number>();

  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = urlOf(input);
    const method = (init?.method ?? 'GET').toUpperCase();
    calls.push({
      url,
      method,
      body: typeof init?.body === 'string' ? init.body : undefined,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
    });

    const key = `${method} ${url}` in routes ? `${method} ${url}` : url;
    const route = routes[key];
    if (route === undefined) {
      return new Response('not found', { status: 404 });
    }
    if (typeof route === 'function') {
      return route(init);
    }

    let reply: StubbedReply;
    if (Array.isArray(route)) {
      const n = served.get(key) ?? 0;
      served.set(key, n + 1);
      reply = route[Math.min(n, route.length - 1)];
    } else {
      reply = route;
    }
    return new Response(reply.body ?? '', { status: reply.status ?? 200, headers: reply.headers });
  });

  vi.stubGlobal('fetch', mock);
  return { calls };
}

export function json(body: unknown, status = 200): StubbedReply {
  return { status, body: JSON.stringify(body), headers: { 'Content-Type': 'application/json' } };
}
