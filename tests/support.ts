/**
 * Admission Control - Shared Test Fixtures
 */

import { RuleIndex } from '../src/rate-limiter/rules/rule-index.js';
import type { CounterStore } from '../src/rate-limiter/store/types.js';
import type { Clock, RateRule, RateRuleInput } from '../src/rate-limiter/types.js';

/** Aligned to every period used in the tests (1s, 5s, 10s, 60s) */
export const T0 = 1_800_000_000_000;

export interface TestClock {
  now: Clock;
  advance: (ms: number) => void;
  set: (ms: number) => void;
}

export function createTestClock(start: number = T0): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
}

/**
 * Compile a single rule and return it
 */
export function compileRule(input: RateRuleInput): RateRule {
  const [rule] = RuleIndex.compile([input]).getRules();
  if (rule === undefined) {
    throw new Error(`rule ${input.pattern} did not compile`);
  }
  return rule;
}

/**
 * Store whose every call fails the way an unreachable server does
 */
export function createFailingStore(message = 'connect ECONNREFUSED 127.0.0.1:6379'): CounterStore {
  const fail = (): Promise<never> => Promise.reject(new Error(message));
  return {
    hitFixedWindow: fail,
    hitMovingWindow: fail,
    getBanTtlMs: fail,
    recordOffense: fail,
    clearBan: fail,
  };
}
