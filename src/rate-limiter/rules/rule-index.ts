/**
 * Admission Control - Rule Index
 * Compiles configured path rules into an immutable, specificity-ordered index
 */

import { ConfigError } from '../../utils/errors.js';
import { normalizePath } from '../../utils/helpers.js';
import type { RateRule, RateRuleInput, WindowStrategy } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

const WILDCARD_MARKER = '/*';

const STRATEGY_ALIASES = new Map<string, WindowStrategy>([
  ['fixed', 'fixed'],
  ['moving', 'moving'],
  ['sliding', 'moving'],
]);

// =============================================================================
// Pattern Parsing
// =============================================================================

interface ParsedPattern {
  id: string;
  prefix: string;
  wildcard: boolean;
}

/**
 * Split a pattern into its normalized prefix and wildcard flag.
 * Returns an error string when the pattern is malformed.
 */
export function parsePattern(pattern: string): ParsedPattern | string {
  const trimmed = pattern.trim();
  if (trimmed.length === 0) {
    return 'pattern must not be empty';
  }
  if (/\s/.test(trimmed)) {
    return `pattern "${pattern}" contains whitespace`;
  }

  const wildcard = trimmed === '*' || trimmed.endsWith(WILDCARD_MARKER);
  const body = trimmed === '*' ? '' : wildcard ? trimmed.slice(0, -WILDCARD_MARKER.length) : trimmed;

  if (body.includes('*')) {
    return `pattern "${pattern}" may only use "*" as a trailing "${WILDCARD_MARKER}"`;
  }

  if (!wildcard) {
    const prefix = normalizePath(body);
    return { id: prefix, prefix, wildcard: false };
  }

  // "/*" covers every path, so its prefix is empty
  const normalized = normalizePath(body);
  const prefix = normalized === '/' ? '' : normalized;
  return { id: `${prefix}${WILDCARD_MARKER}`, prefix, wildcard: true };
}

function matchesPattern(parsed: { prefix: string; wildcard: boolean }, path: string): boolean {
  if (!parsed.wildcard) {
    return path === parsed.prefix;
  }
  return parsed.prefix === '' || path === parsed.prefix || path.startsWith(`${parsed.prefix}/`);
}

/**
 * Exact rules first; wildcards longest prefix first; pattern text breaks ties
 */
function compareSpecificity(a: RateRule, b: RateRule): number {
  if (a.wildcard !== b.wildcard) {
    return a.wildcard ? 1 : -1;
  }
  if (a.prefix.length !== b.prefix.length) {
    return b.prefix.length - a.prefix.length;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

// =============================================================================
// Rule Index Class
// =============================================================================

export class RuleIndex {
  private readonly rules: readonly RateRule[];
  private readonly exempt: readonly ParsedPattern[];

  private constructor(rules: RateRule[], exempt: ParsedPattern[]) {
    this.rules = Object.freeze(rules);
    this.exempt = Object.freeze(exempt);
  }

  /**
   * Validate and compile rules. Every problem is collected and reported in
   * one ConfigError.
   */
  public static compile(inputs: RateRuleInput[], exemptPaths: string[] = []): RuleIndex {
    const problems: string[] = [];
    const rules: RateRule[] = [];
    const seen = new Set<string>();

    for (const input of inputs) {
      const parsed = parsePattern(input.pattern);
      if (typeof parsed === 'string') {
        problems.push(parsed);
        continue;
      }

      const label = `rule "${input.pattern}"`;
      let valid = true;

      if (seen.has(parsed.id)) {
        problems.push(`${label} duplicates pattern "${parsed.id}"`);
        valid = false;
      }
      if (!isPositiveInteger(input.limit)) {
        problems.push(`${label}: limit must be a positive integer, got ${String(input.limit)}`);
        valid = false;
      }
      if (!isPositiveInteger(input.periodSeconds)) {
        problems.push(
          `${label}: period must be a positive integer of seconds, got ${String(input.periodSeconds)}`
        );
        valid = false;
      }
      const strategy = STRATEGY_ALIASES.get(String(input.strategy).toLowerCase());
      if (strategy === undefined) {
        problems.push(`${label}: unknown strategy "${String(input.strategy)}"`);
        valid = false;
      }

      seen.add(parsed.id);
      if (!valid || strategy === undefined) {
        continue;
      }

      rules.push(
        Object.freeze({
          id: parsed.id,
          pattern: input.pattern,
          prefix: parsed.prefix,
          wildcard: parsed.wildcard,
          limit: input.limit,
          periodSeconds: input.periodSeconds,
          strategy,
        })
      );
    }

    const exempt: ParsedPattern[] = [];
    for (const path of exemptPaths) {
      const parsed = parsePattern(path);
      if (typeof parsed === 'string') {
        problems.push(`exempt path: ${parsed}`);
      } else {
        exempt.push(parsed);
      }
    }

    if (problems.length > 0) {
      throw new ConfigError('Invalid rate limit configuration', problems);
    }

    return new RuleIndex(rules.sort(compareSpecificity), exempt);
  }

  /**
   * Every rule matching the path: the exact rule first, then wildcard
   * prefixes from longest to shortest. Empty when the path is unrestricted.
   */
  public match(path: string): readonly RateRule[] {
    const normalized = normalizePath(path);
    return this.rules.filter((rule) => matchesPattern(rule, normalized));
  }

  public isExempt(path: string): boolean {
    const normalized = normalizePath(path);
    return this.exempt.some((entry) => matchesPattern(entry, normalized));
  }

  public getRules(): readonly RateRule[] {
    return this.rules;
  }

  public getExemptPatterns(): string[] {
    return this.exempt.map((entry) => entry.id);
  }

  public get size(): number {
    return this.rules.length;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function compileRuleIndex(rules: RateRuleInput[], exempt?: string[]): RuleIndex {
  return RuleIndex.compile(rules, exempt);
}

export function createEmptyRuleIndex(): RuleIndex {
  return RuleIndex.compile([]);
}

export default RuleIndex;
