/**
 * Admission Control - Moving Window Rate Limiter
 *
 * Approximates a true sliding window with two fixed subwindow counters.
 * The previous subwindow's count is weighted by the share of it that still
 * falls inside the lookback period.
 */

import type { CounterStore } from '../store/types.js';
import type { Clock, RateRule, WindowAlgorithm, WindowDecision } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

const KEY_PREFIX = 'rl:moving:';

// =============================================================================
// Retry Computation
// =============================================================================

export interface MovingWindowState {
  limit: number;
  windowMs: number;
  elapsedMs: number;
  current: number;
  previous: number;
}

/**
 * Milliseconds until one more request fits under the limit.
 *
 * Inside the current subwindow only the previous count decays. If that is
 * not enough, the wait runs into the next subwindow, where the current
 * count becomes the one that decays.
 */
export function movingWindowRetryMs(state: MovingWindowState): number {
  const { limit, windowMs, elapsedMs, current, previous } = state;
  const headroom = limit - 1 - current;

  if (headroom >= 0 && previous > 0) {
    const admitAt = windowMs * (1 - headroom / previous);
    if (admitAt < windowMs) {
      return Math.max(0, admitAt - elapsedMs);
    }
  }

  const untilNext = windowMs - elapsedMs;
  if (current <= limit - 1) {
    return untilNext;
  }
  return untilNext + windowMs * (1 - (limit - 1) / current);
}

// =============================================================================
// Moving Window Limiter Class
// =============================================================================

/**
 * Moving Window Rate Limiter
 *
 * Denied requests are not counted. The estimate assumes the previous
 * subwindow's requests were spread evenly, so a burst at its end can let
 * through at most one subwindow's worth of extra requests.
 */
export class MovingWindowLimiter implements WindowAlgorithm {
  private store: CounterStore;
  private clock: Clock;

  constructor(store: CounterStore, clock: Clock = Date.now) {
    this.store = store;
    this.clock = clock;
  }

  public getStrategy(): 'moving' {
    return 'moving';
  }

  public buildKey(rule: RateRule, identityKey: string, windowIndex: number): string {
    return `${KEY_PREFIX}${rule.id}:${identityKey}:${windowIndex}`;
  }

  public async check(rule: RateRule, identityKey: string): Promise<WindowDecision> {
    const windowMs = rule.periodSeconds * 1000;
    const now = this.clock();
    const windowIndex = Math.floor(now / windowMs);
    const elapsedMs = now - windowIndex * windowMs;

    const { allowed, current, previous } = await this.store.hitMovingWindow({
      previousKey: this.buildKey(rule, identityKey, windowIndex - 1),
      currentKey: this.buildKey(rule, identityKey, windowIndex),
      limit: rule.limit,
      windowMs,
      elapsedMs,
    });

    if (!allowed) {
      const retryMs = movingWindowRetryMs({
        limit: rule.limit,
        windowMs,
        elapsedMs,
        current,
        previous,
      });
      return {
        allowed: false,
        remaining: 0,
        limit: rule.limit,
        resetSeconds: Math.max(1, Math.ceil(retryMs / 1000)),
        rule,
      };
    }

    const approx = current + previous * (1 - elapsedMs / windowMs);

    return {
      allowed: true,
      remaining: Math.max(0, Math.floor(rule.limit - approx)),
      limit: rule.limit,
      resetSeconds: Math.ceil((windowMs - elapsedMs) / 1000),
      rule,
    };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createMovingWindowLimiter(store: CounterStore, clock?: Clock): MovingWindowLimiter {
  return new MovingWindowLimiter(store, clock);
}

export default MovingWindowLimiter;
