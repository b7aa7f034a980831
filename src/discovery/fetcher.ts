import { RateLimiter, type RateLimiterOptions } from './politeness.js';
import { RobotsPolicy } from './robots.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { discardBody } from '../shared/utils.js';

const RATE_LIMIT_STATUSES = new Set([429, 503]);

export interface PoliteFetcherOptions {
  userAgent: string;
  throttleSeconds: number;
  timeoutMs?: number;
  probeTimeoutMs?: number;
  robotsTimeoutMs?: number;
  pacing?: RateLimiterOptions;
}

/**
 * All outbound requests to recipe sites go through here: paced per domain,
 * bounded by a timeout, and never throwing for network-level failures.
 */
export class PoliteFetcher {
  readonly rateLimiter: RateLimiter;
  readonly robots: RobotsPolicy;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;

  constructor(options: PoliteFetcherOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5000;
    this.rateLimiter = new RateLimiter(options.throttleSeconds, options.pacing);
    this.robots = new RobotsPolicy(options.userAgent, { timeoutMs: options.robotsTimeoutMs });
  }

  private headers(accept: string): Record<string, string> {
    return {
      'User-Agent': this.userAgent,
      'Accept-Language': 'en-US,en;q=0.9',
      Accept: accept,
    };
  }

  /**
   * Run `send` under one timer. Whatever `send` reads from the response body
   * is covered by the same deadline as the headers.
   */
  private async timed<T>(timeoutMs: number, send: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await send(controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * HEAD probe: true only for a 200 after redirects.
   */
  async exists(url: string): Promise<boolean> {
    const domain = domainOf(url);
    if (!domain) return false;

    await this.rateLimiter.waitBeforeRequest(domain);
    try {
      const status = await this.timed(this.probeTimeoutMs, async (signal) => {
        const response = await fetch(url, {
          method: 'HEAD',
          headers: this.headers('*/*'),
          signal,
          redirect: 'follow',
        });
        await discardBody(response);
        return response.status;
      });
      return status === 200;
    } catch (err) {
      logger.debug({ url, error: errorMessage(err) }, 'HEAD probe failed');
      return false;
    }
  }

  /**
   * Paced GET. Returns null for throttling, HTTP errors and network failures.
   */
  async getText(
    url: string,
    accept = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  ): Promise<string | null> {
    const domain = domainOf(url);
    if (!domain) return null;

    await this.rateLimiter.waitBeforeRequest(domain);
    try {
      const { status, body } = await this.timed(this.timeoutMs, async (signal) => {
        const response = await fetch(url, {
          method: 'GET',
          headers: this.headers(accept),
          signal,
          redirect: 'follow',
        });
        if (!response.ok) {
          await discardBody(response);
          return { status: response.status, body: null };
        }
        return { status: response.status, body: await response.text() };
      });

      if (RATE_LIMIT_STATUSES.has(status)) {
        this.rateLimiter.onRateLimited(domain);
        return null;
      }

      if (body === null) {
        logger.warn({ url, status }, 'Fetch failed');
        return null;
      }

      this.rateLimiter.onSuccess(domain);
      return body;
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'AbortError';
      logger.warn(
        { url, error: timedOut ? `timed out after ${this.timeoutMs}ms` : errorMessage(err) },
        'Fetch failed',
      );
      return null;
    }
  }

  /**
   * GET a page for parsing, honouring robots.txt.
   */
  async fetchHtml(url: string): Promise<string | null> {
    if (!(await this.robots.isAllowed(url))) {
      logger.warn({ url }, 'URL blocked by robots.txt');
      return null;
    }
    return this.getText(url);
  }
}

export function domainOf(url: string): string | null {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return null;
  }
}
