/**
 * Admission Control - Rate Limiter Type Definitions
 */

import type { BackendError } from '../utils/errors.js';

// =============================================================================
// Rule Types
// =============================================================================

/**
 * Supported window strategies
 */
export type WindowStrategy = 'fixed' | 'moving';

/**
 * A compiled path rule. Frozen once it leaves the rule index.
 */
export interface RateRule {
  /** Normalized pattern; unique inside one index and used in store keys */
  readonly id: string;
  /** Pattern as written in configuration */
  readonly pattern: string;
  /** Exact path, or the prefix before the trailing wildcard marker */
  readonly prefix: string;
  /** Whether the pattern ends in the wildcard marker */
  readonly wildcard: boolean;
  /** Requests admitted per period */
  readonly limit: number;
  /** Window length in seconds */
  readonly periodSeconds: number;
  readonly strategy: WindowStrategy;
}

/**
 * Rule as handed to the compiler, before validation
 */
export interface RateRuleInput {
  pattern: string;
  limit: number;
  periodSeconds: number;
  strategy: string;
}

// =============================================================================
// Window Check Types
// =============================================================================

/**
 * Result of evaluating one rule for one identity
 */
export interface WindowDecision {
  allowed: boolean;
  /** Requests left in the current window */
  remaining: number;
  limit: number;
  /** Seconds until the window resets (or, when denied, until a request can be admitted) */
  resetSeconds: number;
  rule: RateRule;
}

/**
 * Per-strategy window algorithm
 */
export interface WindowAlgorithm {
  check(rule: RateRule, identityKey: string): Promise<WindowDecision>;
  getStrategy(): WindowStrategy;
}

// =============================================================================
// Ban Types
// =============================================================================

/**
 * Namespace of an offense counter and ban: the whole site, or one rule
 */
export type BanScope = { kind: 'site' } | { kind: 'rule'; ruleId: string };

export interface BanStatus {
  banned: boolean;
  /** Seconds left on the ban; 0 when not banned */
  remainingSeconds: number;
}

export interface OffenseOutcome {
  /** Offenses counted in the current cycle (0 right after a ban was applied) */
  offenses: number;
  /** Bans applied since the offense record was created */
  banCount: number;
  /** Whether this offense triggered a ban */
  banned: boolean;
  /** Length of the ban just applied; 0 when none */
  banSeconds: number;
}

export interface BanPolicy {
  /** Offenses that trigger a ban */
  banOffenses: number;
  /** First ban length in seconds */
  banLength: number;
  /** Upper bound for escalated bans, in seconds */
  banMaxLength: number;
  /** Idle time after which offense and ban counts reset, in seconds */
  banCounterTtl: number;
}

// =============================================================================
// Admission Types
// =============================================================================

export type AdmissionOutcome =
  | 'exempt'
  | 'unrestricted'
  | 'allowed'
  | 'rate_limited'
  | 'banned'
  | 'backend_error';

/**
 * What to do with a request when the counter store fails
 */
export type FailureMode = 'open' | 'closed';

/**
 * Response headers reported to the client
 */
export interface RateLimitHeaders {
  RateLimit?: string;
  'RateLimit-Policy'?: string;
  'Retry-After'?: string;
}

export interface AdmissionDecision {
  allowed: boolean;
  status: 200 | 403 | 429 | 503;
  outcome: AdmissionOutcome;
  headers: RateLimitHeaders;
  /** Rule whose numbers are reported in the headers */
  bindingRule?: RateRule;
  /** Seconds the client should wait before retrying */
  retryAfter?: number;
  /** Store failure that produced a backend_error outcome */
  error?: BackendError;
}

export interface AdmissionSettings {
  enableBans: boolean;
  siteBan: boolean;
  failureMode: FailureMode;
}

export interface AdmissionMetrics {
  checks: number;
  allowed: number;
  exempt: number;
  unrestricted: number;
  rateLimited: number;
  banned: number;
  backendErrors: number;
}

/**
 * Milliseconds since the epoch
 */
export type Clock = () => number;
