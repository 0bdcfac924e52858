import { RATE_LIMIT } from '@knowledge-assistant/shared';
import type { KeyValueStore } from '../utils/redis';
import { logger } from '../utils/logger';

/**
 * Fixed-window rate limiter.
 *
 * One counter per (tenant, operation, window). Bursts straddling a window
 * boundary can reach twice the nominal rate; counters from old windows are
 * never read again and expire on their own TTL.
 */

export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
}

export interface RateLimiterOptions {
  store: KeyValueStore;
  perMinute: number;
  perHour?: number;
  now?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  count: number;
  rule: RateLimitRule;
}

export class RateLimiter {
  private readonly store: KeyValueStore;
  private readonly rules: RateLimitRule[];
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.now = options.now ?? Date.now;
    this.rules = [{ limit: options.perMinute, windowSeconds: RATE_LIMIT.MINUTE_WINDOW }];
    if (options.perHour !== undefined) {
      this.rules.push({ limit: options.perHour, windowSeconds: RATE_LIMIT.HOUR_WINDOW });
    }
  }

  async allow(tenantId: string, operation: string = 'query'): Promise<boolean> {
    const decision = await this.check(tenantId, operation);
    return decision.allowed;
  }

  /**
   * Count the call against each window in turn, stopping at the first that
   * rejects it.
   */
  async check(tenantId: string, operation: string = 'query'): Promise<RateLimitDecision> {
    const nowSeconds = this.now() / 1000;
    let last: RateLimitDecision | undefined;

    for (const rule of this.rules) {
      const window = Math.floor(nowSeconds / rule.windowSeconds);
      const key = rateLimitKey(tenantId, operation, rule.windowSeconds, window);
      const count = await this.store.incrementWithExpiry(key, rule.windowSeconds);

      last = { allowed: count <= rule.limit, count, rule };
      if (!last.allowed) {
        logger.warn({ tenantId, operation, count, limit: rule.limit, windowSeconds: rule.windowSeconds }, 'Rate limit exceeded');
        return last;
      }
    }

    if (!last) {
      throw new Error('RateLimiter has no rules configured');
    }
    return last;
  }
}

/**
 * The per-minute key keeps the plain `ratelimit:{tenant}:{operation}:{window}`
 * form; longer windows carry their length so they never share a counter.
 */
export function rateLimitKey(
  tenantId: string,
  operation: string,
  windowSeconds: number,
  window: number
): string {
  if (windowSeconds === RATE_LIMIT.MINUTE_WINDOW) {
    return `ratelimit:${tenantId}:${operation}:${window}`;
  }
  return `ratelimit:${tenantId}:${operation}:${windowSeconds}s:${window}`;
}
