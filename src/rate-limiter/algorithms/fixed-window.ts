/**
 * Admission Control - Fixed Window Rate Limiter
 *
 * Discrete windows aligned to multiples of the period. The counter for a
 * window is created by its first request and expires with the window.
 */

import type { CounterStore } from '../store/types.js';
import type { Clock, RateRule, WindowAlgorithm, WindowDecision } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

const KEY_PREFIX = 'rl:fixed:';

// =============================================================================
// Fixed Window Limiter Class
// =============================================================================

/**
 * Fixed Window Rate Limiter
 *
 * Every request is counted, admitted or not, so a caller who keeps
 * hammering a closed window keeps it closed until the boundary.
 *
 * Can admit up to twice the limit across a window boundary.
 */
export class FixedWindowLimiter implements WindowAlgorithm {
  private store: CounterStore;
  private clock: Clock;

  constructor(store: CounterStore, clock: Clock = Date.now) {
    this.store = store;
    this.clock = clock;
  }

  public getStrategy(): 'fixed' {
    return 'fixed';
  }

  /**
   * Counter key for one rule, identity and window
   */
  public buildKey(rule: RateRule, identityKey: string, windowIndex: number): string {
    return `${KEY_PREFIX}${rule.id}:${identityKey}:${windowIndex}`;
  }

  public async check(rule: RateRule, identityKey: string): Promise<WindowDecision> {
    const windowMs = rule.periodSeconds * 1000;
    const now = this.clock();
    const windowIndex = Math.floor(now / windowMs);
    const windowEnd = (windowIndex + 1) * windowMs;

    const { allowed, count } = await this.store.hitFixedWindow({
      key: this.buildKey(rule, identityKey, windowIndex),
      limit: rule.limit,
      windowMs,
    });

    return {
      allowed,
      remaining: Math.max(0, rule.limit - count),
      limit: rule.limit,
      resetSeconds: Math.ceil((windowEnd - now) / 1000),
      rule,
    };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createFixedWindowLimiter(store: CounterStore, clock?: Clock): FixedWindowLimiter {
  return new FixedWindowLimiter(store, clock);
}

export default FixedWindowLimiter;
