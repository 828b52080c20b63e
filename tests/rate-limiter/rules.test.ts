/**
 * Admission Control - Rule Index Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  RuleIndex,
  compileRuleIndex,
  createEmptyRuleIndex,
  parsePattern,
} from '../../src/rate-limiter/rules/rule-index.js';
import type { RateRuleInput } from '../../src/rate-limiter/types.js';
import { ConfigError } from '../../src/utils/errors.js';

// =============================================================================
// Test Data
// =============================================================================

const rule = (pattern: string, limit = 10, periodSeconds = 60, strategy = 'fixed'): RateRuleInput => ({
  pattern,
  limit,
  periodSeconds,
  strategy,
});

const SAMPLE_RULES: RateRuleInput[] = [
  rule('/api/*', 10, 1, 'moving'),
  rule('/api/auth/*', 3, 1, 'fixed'),
  rule('/api/users/me', 1, 5, 'fixed'),
];

const ids = (index: RuleIndex, path: string): string[] => index.match(path).map((r) => r.id);

function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

// =============================================================================
// Pattern Parsing Tests
// =============================================================================

describe('parsePattern', () => {
  it('should parse exact patterns', () => {
    expect(parsePattern('/api/users/me')).toEqual({
      id: '/api/users/me',
      prefix: '/api/users/me',
      wildcard: false,
    });
  });

  it('should parse wildcard patterns', () => {
    expect(parsePattern('/api/*')).toEqual({ id: '/api/*', prefix: '/api', wildcard: true });
  });

  it('should normalize slashes', () => {
    expect(parsePattern('api/users/')).toEqual({
      id: '/api/users',
      prefix: '/api/users',
      wildcard: false,
    });
    expect(parsePattern('api/*')).toEqual({ id: '/api/*', prefix: '/api', wildcard: true });
  });

  it('should treat "/*" and "*" as match-all', () => {
    expect(parsePattern('/*')).toEqual({ id: '/*', prefix: '', wildcard: true });
    expect(parsePattern('*')).toEqual({ id: '/*', prefix: '', wildcard: true });
  });

  it('should reject malformed patterns', () => {
    expect(parsePattern('')).toBe('pattern must not be empty');
    expect(parsePattern('/a b')).toBe('pattern "/a b" contains whitespace');
    expect(parsePattern('/a*b')).toBe('pattern "/a*b" may only use "*" as a trailing "/*"');
    expect(parsePattern('/*/x')).toBe('pattern "/*/x" may only use "*" as a trailing "/*"');
  });
});

// =============================================================================
// Matching Tests
// =============================================================================

describe('RuleIndex.match', () => {
  const index = compileRuleIndex(SAMPLE_RULES);

  it('should return wildcard prefixes longest first', () => {
    expect(ids(index, '/api/auth/login')).toEqual(['/api/auth/*', '/api/*']);
  });

  it('should put the exact rule before wildcards', () => {
    expect(ids(index, '/api/users/me')).toEqual(['/api/users/me', '/api/*']);
  });

  it('should return nothing for unrestricted paths', () => {
    expect(index.match('/other')).toEqual([]);
  });

  it('should match wildcards on segment boundaries only', () => {
    expect(ids(index, '/api')).toEqual(['/api/*']);
    expect(ids(index, '/apiary')).toEqual([]);
    expect(ids(index, '/api/authors')).toEqual(['/api/*']);
  });

  it('should ignore a trailing slash on the request path', () => {
    expect(ids(index, '/api/users/me/')).toEqual(['/api/users/me', '/api/*']);
  });

  it('should match every path with "/*"', () => {
    const catchAll = compileRuleIndex([rule('/*'), rule('/api/*')]);
    expect(ids(catchAll, '/')).toEqual(['/*']);
    expect(ids(catchAll, '/api/x')).toEqual(['/api/*', '/*']);
  });

  it('should order equal-length wildcards by pattern text', () => {
    const tied = compileRuleIndex([rule('/b/*'), rule('/a/*')]);
    expect(tied.getRules().map((r) => r.id)).toEqual(['/a/*', '/b/*']);
  });

  it('should be deterministic across calls', () => {
    const first = index.match('/api/auth/login');
    const second = index.match('/api/auth/login');
    expect(second).toEqual(first);
    expect(second.map((r) => r.id)).toEqual(first.map((r) => r.id));
  });

  it('should not depend on configuration order', () => {
    const reversed = compileRuleIndex([...SAMPLE_RULES].reverse());
    expect(reversed.getRules().map((r) => r.id)).toEqual(index.getRules().map((r) => r.id));
  });

  it('should freeze compiled rules', () => {
    const [first] = index.getRules();
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(index.getRules())).toBe(true);
  });
});

// =============================================================================
// Compilation Tests
// =============================================================================

describe('RuleIndex.compile', () => {
  it('should keep limit, period and pattern', () => {
    const [compiled] = compileRuleIndex([rule('/api/users/me/', 1, 5, 'fixed')]).getRules();
    expect(compiled).toEqual({
      id: '/api/users/me',
      pattern: '/api/users/me/',
      prefix: '/api/users/me',
      wildcard: false,
      limit: 1,
      periodSeconds: 5,
      strategy: 'fixed',
    });
  });

  it('should accept strategies in any case and "sliding" as moving', () => {
    const index = compileRuleIndex([rule('/a', 1, 1, 'MOVING'), rule('/b', 1, 1, 'Sliding'), rule('/c', 1, 1, 'Fixed')]);
    expect(index.getRules().map((r) => [r.id, r.strategy])).toEqual([
      ['/a', 'moving'],
      ['/b', 'moving'],
      ['/c', 'fixed'],
    ]);
  });

  it('should report every problem in one ConfigError', () => {
    const error = captureConfigError(() =>
      RuleIndex.compile(
        [
          rule('/ok', 0, 1),
          rule('/p', 1, -1),
          rule('/s', 1, 1, 'leaky'),
          rule('/a*b'),
          rule('/dup'),
          rule('/dup/'),
        ],
        ['bad path']
      )
    );

    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.isOperational).toBe(false);
    expect(error.problems).toEqual([
      'rule "/ok": limit must be a positive integer, got 0',
      'rule "/p": period must be a positive integer of seconds, got -1',
      'rule "/s": unknown strategy "leaky"',
      'pattern "/a*b" may only use "*" as a trailing "/*"',
      'rule "/dup/" duplicates pattern "/dup"',
      'exempt path: pattern "bad path" contains whitespace',
    ]);
  });

  it('should reject fractional limits and periods', () => {
    const error = captureConfigError(() => RuleIndex.compile([rule('/x', 1.5, 0.5)]));
    expect(error.problems).toEqual([
      'rule "/x": limit must be a positive integer, got 1.5',
      'rule "/x": period must be a positive integer of seconds, got 0.5',
    ]);
  });

  it('should compile an empty rule set', () => {
    const index = createEmptyRuleIndex();
    expect(index.size).toBe(0);
    expect(index.match('/anything')).toEqual([]);
  });
});

// =============================================================================
// Exempt Path Tests
// =============================================================================

describe('RuleIndex.isExempt', () => {
  const index = compileRuleIndex(SAMPLE_RULES, ['/health', '/static/*']);

  it('should match exact exempt paths', () => {
    expect(index.isExempt('/health')).toBe(true);
    expect(index.isExempt('/health/')).toBe(true);
    expect(index.isExempt('/healthz')).toBe(false);
  });

  it('should match wildcard exempt paths', () => {
    expect(index.isExempt('/static')).toBe(true);
    expect(index.isExempt('/static/app.js')).toBe(true);
    expect(index.isExempt('/statics')).toBe(false);
  });

  it('should list normalized exempt patterns', () => {
    expect(index.getExemptPatterns()).toEqual(['/health', '/static/*']);
  });
});
