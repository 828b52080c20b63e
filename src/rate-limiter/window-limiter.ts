/**
 * Admission Control - Window Limiter
 * Evaluates one rule for one identity, dispatching on the rule's strategy
 */

import { asBackendError } from '../utils/errors.js';
import { hashIdentity } from '../utils/helpers.js';

import { FixedWindowLimiter } from './algorithms/fixed-window.js';
import { MovingWindowLimiter } from './algorithms/moving-window.js';
import type { CounterStore } from './store/types.js';
import type { Clock, RateRule, WindowAlgorithm, WindowDecision, WindowStrategy } from './types.js';

export class WindowLimiter {
  private fixedWindowLimiter: FixedWindowLimiter;
  private movingWindowLimiter: MovingWindowLimiter;

  constructor(store: CounterStore, clock: Clock = Date.now) {
    this.fixedWindowLimiter = new FixedWindowLimiter(store, clock);
    this.movingWindowLimiter = new MovingWindowLimiter(store, clock);
  }

  /**
   * Count this request against the rule and report whether it fits.
   * Throws BackendError when the store fails; there is no retry.
   */
  public async check(rule: RateRule, identity: string): Promise<WindowDecision> {
    const limiter = this.getLimiter(rule.strategy);
    try {
      return await limiter.check(rule, hashIdentity(identity));
    } catch (error) {
      throw asBackendError('window-check', error);
    }
  }

  private getLimiter(strategy: WindowStrategy): WindowAlgorithm {
    switch (strategy) {
      case 'fixed':
        return this.fixedWindowLimiter;
      case 'moving':
        return this.movingWindowLimiter;
    }
  }
}

export function createWindowLimiter(store: CounterStore, clock?: Clock): WindowLimiter {
  return new WindowLimiter(store, clock);
}

export default WindowLimiter;
