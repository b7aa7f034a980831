import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export const MAX_BACKOFF_MULTIPLIER = 32;
export const MIN_BACKOFF_MULTIPLIER = 1;
const SUCCESS_DECAY = 0.9;

interface DomainPacing {
  lastRequestAt: number;
  multiplier: number;
}

export interface RateLimiterOptions {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
  /** Delay implementation (default: setTimeout-based) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Per-domain request pacing with adaptive backoff.
 * One request per `baseDelay × multiplier` seconds for each domain.
 */
export class RateLimiter {
  private readonly pacing = new Map<string, DomainPacing>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly baseDelaySeconds: number,
    options: RateLimiterOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  private stateFor(domain: string): DomainPacing {
    let state = this.pacing.get(domain);
    if (!state) {
      state = { lastRequestAt: Number.NEGATIVE_INFINITY, multiplier: MIN_BACKOFF_MULTIPLIER };
      this.pacing.set(domain, state);
    }
    return state;
  }

  async waitBeforeRequest(domain: string): Promise<void> {
    const state = this.stateFor(domain);
    const delayMs = this.baseDelaySeconds * state.multiplier * 1000;
    const elapsed = this.now() - state.lastRequestAt;

    if (elapsed < delayMs) {
      const waitMs = delayMs - elapsed;
      logger.debug({ domain, waitMs: Math.round(waitMs) }, 'Rate limiting');
      await this.sleep(waitMs);
    }

    state.lastRequestAt = this.now();
  }

  onSuccess(domain: string): void {
    const state = this.stateFor(domain);
    state.multiplier = Math.max(MIN_BACKOFF_MULTIPLIER, state.multiplier * SUCCESS_DECAY);
  }

  onRateLimited(domain: string): void {
    const state = this.stateFor(domain);
    state.multiplier = Math.min(MAX_BACKOFF_MULTIPLIER, state.multiplier * 2);
    logger.warn({ domain, multiplier: state.multiplier }, 'Rate limited, backing off');
  }

  multiplierFor(domain: string): number {
    return this.pacing.get(domain)?.multiplier ?? MIN_BACKOFF_MULTIPLIER;
  }
}
