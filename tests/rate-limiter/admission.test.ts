/**
 * Admission Control - Admission Controller Tests
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';

import { AdmissionController, selectBindingDecision } from '../../src/rate-limiter/admission.js';
import { compileRuleIndex } from '../../src/rate-limiter/rules/rule-index.js';
import { MemoryCounterStore } from '../../src/rate-limiter/store/memory-store.js';
import type { CounterStore } from '../../src/rate-limiter/store/types.js';
import type {
  AdmissionSettings,
  BanPolicy,
  RateRuleInput,
  WindowDecision,
} from '../../src/rate-limiter/types.js';
import { BackendError } from '../../src/utils/errors.js';
import { T0, compileRule, createFailingStore, createTestClock, type TestClock } from '../support.js';

// =============================================================================
// Test Data
// =============================================================================

const rule = (pattern: string, limit: number, periodSeconds: number, strategy = 'fixed'): RateRuleInput => ({
  pattern,
  limit,
  periodSeconds,
  strategy,
});

const policy: BanPolicy = {
  banOffenses: 10,
  banLength: 60,
  banMaxLength: 480,
  banCounterTtl: 600,
};

const settings: AdmissionSettings = {
  enableBans: true,
  siteBan: false,
  failureMode: 'closed',
};

const CALLER = '203.0.113.9';

interface Harness {
  clock: TestClock;
  store: MemoryCounterStore;
  controller: AdmissionController;
}

function createHarness(
  rules: RateRuleInput[],
  overrides: { policy?: Partial<BanPolicy>; settings?: Partial<AdmissionSettings>; exempt?: string[] } = {}
): Harness {
  const clock = createTestClock(T0);
  const store = new MemoryCounterStore(clock.now);
  const controller = new AdmissionController({
    ruleIndex: compileRuleIndex(rules, overrides.exempt ?? []),
    store,
    policy: { ...policy, ...overrides.policy },
    settings: { ...settings, ...overrides.settings },
    clock: clock.now,
  });
  return { clock, store, controller };
}

function decision(pattern: string, allowed: boolean, remaining: number, limit: number, resetSeconds: number): WindowDecision {
  return {
    allowed,
    remaining,
    limit,
    resetSeconds,
    rule: compileRule(rule(pattern, limit, 60)),
  };
}

// =============================================================================
// Binding Rule Selection Tests
// =============================================================================

describe('selectBindingDecision', () => {
  it('should return nothing for no decisions', () => {
    expect(selectBindingDecision([])).toBeUndefined();
  });

  it('should pick the denial with the longest reset', () => {
    const binding = selectBindingDecision([
      decision('/a', false, 0, 5, 10),
      decision('/b', true, 3, 5, 60),
      decision('/c', false, 0, 5, 40),
    ]);
    expect(binding?.rule.id).toBe('/c');
  });

  it('should pick the allowed rule closest to its limit', () => {
    const binding = selectBindingDecision([
      decision('/a', true, 50, 100, 60),
      decision('/b', true, 1, 5, 60),
      decision('/c', true, 4, 10, 60),
    ]);
    expect(binding?.rule.id).toBe('/b');
  });

  it('should keep the earlier rule on a tie', () => {
    const binding = selectBindingDecision([
      decision('/a', false, 0, 5, 30),
      decision('/b', false, 0, 5, 30),
    ]);
    expect(binding?.rule.id).toBe('/a');
  });
});

// =============================================================================
// Admission Controller Tests
// =============================================================================

describe('AdmissionController', () => {
  describe('outcomes', () => {
    let harness: Harness;

    beforeEach(() => {
      harness = createHarness(
        [rule('/api/auth/login', 3, 60), rule('/api/*', 100, 60, 'moving')],
        { exempt: ['/health'] }
      );
    });

    it('should admit exempt paths without touching the store', async () => {
      const spy = jest.spyOn(harness.store, 'getBanTtlMs');
      const result = await harness.controller.check('/health', CALLER);
      expect(result).toEqual({ allowed: true, status: 200, outcome: 'exempt', headers: {} });
      expect(spy).not.toHaveBeenCalled();
    });

    it('should admit paths no rule covers', async () => {
      const result = await harness.controller.check('/about', CALLER);
      expect(result).toEqual({ allowed: true, status: 200, outcome: 'unrestricted', headers: {} });
    });

    it('should report the rule closest to its limit', async () => {
      const result = await harness.controller.check('/api/auth/login', CALLER);
      expect(result.allowed).toBe(true);
      expect(result.status).toBe(200);
      expect(result.outcome).toBe('allowed');
      expect(result.bindingRule?.id).toBe('/api/auth/login');
      expect(result.headers).toEqual({
        RateLimit: 'limit=3, remaining=2, reset=60',
        'RateLimit-Policy': '3;w=60',
      });
    });

    it('should refuse with 429 once a rule is exhausted', async () => {
      for (let i = 0; i < 3; i++) {
        expect((await harness.controller.check('/api/auth/login', CALLER)).allowed).toBe(true);
      }

      const result = await harness.controller.check('/api/auth/login', CALLER);
      expect(result).toEqual({
        allowed: false,
        status: 429,
        outcome: 'rate_limited',
        headers: {
          RateLimit: 'limit=3, remaining=0, reset=60',
          'RateLimit-Policy': '3;w=60',
          'Retry-After': '60',
        },
        bindingRule: expect.objectContaining({ id: '/api/auth/login' }),
        retryAfter: 60,
      });
    });

    it('should count a request against every matching rule', async () => {
      for (let i = 0; i < 4; i++) {
        await harness.controller.check('/api/auth/login', CALLER);
      }
      // the moving rule admitted all four login requests
      const result = await harness.controller.check('/api/items', CALLER);
      expect(result.headers.RateLimit).toBe('limit=100, remaining=95, reset=60');
    });

    it('should normalize the request path', async () => {
      const result = await harness.controller.check('/api/auth/login/', CALLER);
      expect(result.bindingRule?.id).toBe('/api/auth/login');
    });

    it('should keep callers apart', async () => {
      for (let i = 0; i < 4; i++) {
        await harness.controller.check('/api/auth/login', CALLER);
      }
      expect((await harness.controller.check('/api/auth/login', '203.0.113.10')).allowed).toBe(true);
    });
  });

  describe('binding rule', () => {
    it('should bind to the denial that lasts longest', async () => {
      const { clock, controller } = createHarness([rule('/x/*', 1, 60), rule('/x/y', 1, 10)]);
      clock.set(T0 + 5_000);

      await controller.check('/x/y', CALLER);
      const result = await controller.check('/x/y', CALLER);

      expect(result.status).toBe(429);
      expect(result.bindingRule?.id).toBe('/x/*');
      expect(result.retryAfter).toBe(55);
      expect(result.headers['Retry-After']).toBe('55');
    });

    it('should bind to the more specific rule on a tie', async () => {
      const { controller } = createHarness([rule('/x/*', 1, 60), rule('/x/y', 1, 60)]);

      await controller.check('/x/y', CALLER);
      const result = await controller.check('/x/y', CALLER);

      expect(result.bindingRule?.id).toBe('/x/y');
    });
  });

  describe('bans', () => {
    it('should ban per rule after repeated refusals', async () => {
      const { controller } = createHarness(
        [rule('/api/login', 3, 60), rule('/api/other', 3, 60)],
        { policy: { banOffenses: 2 } }
      );

      const statuses: number[] = [];
      for (let i = 0; i < 6; i++) {
        statuses.push((await controller.check('/api/login', CALLER)).status);
      }
      expect(statuses).toEqual([200, 200, 200, 429, 429, 403]);

      const banned = await controller.check('/api/login', CALLER);
      expect(banned).toEqual({
        allowed: false,
        status: 403,
        outcome: 'banned',
        headers: { 'Retry-After': '60' },
        retryAfter: 60,
      });

      expect((await controller.check('/api/other', CALLER)).status).toBe(200);
    });

    it('should not count banned requests anywhere', async () => {
      const { store, controller } = createHarness([rule('/api/login', 1, 60)], {
        policy: { banOffenses: 2 },
      });
      for (let i = 0; i < 3; i++) {
        await controller.check('/api/login', CALLER);
      }

      const fixed = jest.spyOn(store, 'hitFixedWindow');
      const moving = jest.spyOn(store, 'hitMovingWindow');
      const offense = jest.spyOn(store, 'recordOffense');

      for (let i = 0; i < 5; i++) {
        expect((await controller.check('/api/login', CALLER)).status).toBe(403);
      }
      expect(fixed).not.toHaveBeenCalled();
      expect(moving).not.toHaveBeenCalled();
      expect(offense).not.toHaveBeenCalled();
    });

    it('should admit again once the ban runs out', async () => {
      const { clock, controller } = createHarness([rule('/api/login', 1, 60)], {
        policy: { banOffenses: 2 },
      });
      for (let i = 0; i < 3; i++) {
        await controller.check('/api/login', CALLER);
      }
      expect((await controller.check('/api/login', CALLER)).status).toBe(403);

      clock.advance(60_000);
      expect((await controller.check('/api/login', CALLER)).status).toBe(200);
    });

    it('should block every path under a site ban', async () => {
      const { controller } = createHarness([rule('/api/login', 1, 60)], {
        policy: { banOffenses: 2 },
        settings: { siteBan: true },
      });
      for (let i = 0; i < 3; i++) {
        await controller.check('/api/login', CALLER);
      }

      const result = await controller.check('/public', CALLER);
      expect(result.status).toBe(403);
      expect(result.outcome).toBe('banned');
    });

    it('should never ban when bans are disabled', async () => {
      const { store, controller } = createHarness([rule('/api/login', 1, 60)], {
        policy: { banOffenses: 1 },
        settings: { enableBans: false },
      });
      const offense = jest.spyOn(store, 'recordOffense');

      const statuses: number[] = [];
      for (let i = 0; i < 10; i++) {
        statuses.push((await controller.check('/api/login', CALLER)).status);
      }
      expect(statuses).toEqual([200, 429, 429, 429, 429, 429, 429, 429, 429, 429]);
      expect(offense).not.toHaveBeenCalled();
    });
  });

  describe('concurrency', () => {
    it('should admit exactly the limit under concurrent requests', async () => {
      const { controller } = createHarness([rule('/api/search', 5, 60)]);

      const results = await Promise.all(
        Array.from({ length: 50 }, () => controller.check('/api/search', CALLER))
      );

      expect(results.filter((r) => r.status === 200)).toHaveLength(5);
      expect(results.filter((r) => r.status === 429)).toHaveLength(45);
    });
  });

  describe('store failures', () => {
    function createFailing(overrides: Partial<AdmissionSettings>, store: CounterStore = createFailingStore()) {
      return new AdmissionController({
        ruleIndex: compileRuleIndex([rule('/api/*', 5, 60)], ['/health']),
        store,
        policy,
        settings: { ...settings, ...overrides },
      });
    }

    it('should admit when failing open', async () => {
      const controller = createFailing({ failureMode: 'open' });
      const result = await controller.check('/api/items', CALLER);

      expect(result.allowed).toBe(true);
      expect(result.status).toBe(200);
      expect(result.outcome).toBe('backend_error');
      expect(result.headers).toEqual({});
      expect(result.error).toBeInstanceOf(BackendError);
      expect(result.error?.operation).toBe('ban-check');
    });

    it('should refuse with 503 when failing closed', async () => {
      const controller = createFailing({ failureMode: 'closed' });
      const result = await controller.check('/api/items', CALLER);

      expect(result.allowed).toBe(false);
      expect(result.status).toBe(503);
      expect(result.outcome).toBe('backend_error');
    });

    it('should report the window check when bans are disabled', async () => {
      const controller = createFailing({ enableBans: false });
      const result = await controller.check('/api/items', CALLER);

      expect(result.status).toBe(503);
      expect(result.error?.operation).toBe('window-check');
      expect(result.error?.message).toBe(
        'Counter store window-check failed: connect ECONNREFUSED 127.0.0.1:6379'
      );
    });

    it('should not need the store for exempt or unrestricted paths', async () => {
      const controller = createFailing({ enableBans: false });
      expect((await controller.check('/health', CALLER)).outcome).toBe('exempt');
      expect((await controller.check('/about', CALLER)).outcome).toBe('unrestricted');
    });

    it('should treat a store that throws outright as unavailable', async () => {
      const store = new MemoryCounterStore();
      store.hitFixedWindow = () => {
        throw new TypeError('socket closed');
      };
      const controller = createFailing({}, store);

      const result = await controller.check('/api/items', CALLER);
      expect(result.status).toBe(503);
      expect(result.error?.operation).toBe('window-check');
      expect(result.error?.message).toBe('Counter store window-check failed: socket closed');
    });
  });

  describe('metrics and reload', () => {
    it('should count outcomes', async () => {
      const { controller } = createHarness([rule('/api/login', 1, 60)], { exempt: ['/health'] });

      await controller.check('/health', CALLER);
      await controller.check('/about', CALLER);
      await controller.check('/api/login', CALLER);
      await controller.check('/api/login', CALLER);

      expect(controller.getMetrics()).toEqual({
        checks: 4,
        allowed: 1,
        exempt: 1,
        unrestricted: 1,
        rateLimited: 1,
        banned: 0,
        backendErrors: 0,
      });

      controller.resetMetrics();
      expect(controller.getMetrics().checks).toBe(0);
    });

    it('should apply a reloaded rule set to later checks', async () => {
      const { controller } = createHarness([rule('/api/login', 1, 60)]);
      await controller.check('/api/login', CALLER);
      expect((await controller.check('/api/login', CALLER)).status).toBe(429);

      controller.reload(compileRuleIndex([rule('/api/search', 1, 60)]));

      expect(controller.getRuleIndex().size).toBe(1);
      expect((await controller.check('/api/login', CALLER)).outcome).toBe('unrestricted');
      expect((await controller.check('/api/search', CALLER)).outcome).toBe('allowed');
    });

    it('should expose a copy of its settings', () => {
      const { controller } = createHarness([]);
      expect(controller.getSettings()).toEqual(settings);
      expect(controller.getBanManager().isSiteBan()).toBe(false);
    });
  });
});
